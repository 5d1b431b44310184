import type { ImageReference, RepositoryResult } from '@radar/shared';
import { errorMessage, log } from '../logging';
import { PROJECT_PROFILE } from '../pipelines/content-analysis';
import type { TreeEntry } from '../search/github';
import { collectImages } from './images';
import type { ArtifactAdapter } from './types';

const README_CHARS = 15000;
const STRUCTURE_LINES = 50;
const KEY_FILE_COUNT = 5;
const KEY_FILE_CHARS = 3000;
const MAX_KEY_FILE_BYTES = 50000;
const MAX_DEPTH = 2;

const CODE_EXTENSIONS = new Set(['.py', '.js', '.ts', '.java', '.go', '.rs', '.cpp', '.c', '.h']);
const DOC_EXTENSIONS = new Set(['.md', '.rst', '.txt']);
const MANIFEST_NAMES = new Set(['setup.py', 'requirements.txt', 'package.json']);

/** The slice of the GitHub API repository analysis needs. */
export interface RepositoryContentSource {
  getReadme(fullName: string): Promise<string>;
  getTree(fullName: string): Promise<TreeEntry[]>;
  getFileContent(fullName: string, path: string): Promise<string>;
}

interface VisibleEntry extends TreeEntry {
  name: string;
  depth: number;
}

function extensionOf(name: string): string {
  const dot = name.lastIndexOf('.');
  return dot > 0 ? name.slice(dot).toLowerCase() : '';
}

/** Entries at depth ≤ 2 that do not sit inside a hidden directory. */
export function visibleEntries(tree: readonly TreeEntry[]): VisibleEntry[] {
  const visible: VisibleEntry[] = [];
  for (const entry of tree) {
    const segments = entry.path.split('/');
    const depth = segments.length - 1;
    if (depth > MAX_DEPTH) continue;

    const name = segments[segments.length - 1];
    const directories = entry.type === 'dir' ? segments : segments.slice(0, -1);
    if (directories.some((segment) => segment.startsWith('.'))) continue;

    visible.push({ ...entry, name, depth });
  }
  return visible;
}

export function formatStructure(entries: readonly VisibleEntry[]): string[] {
  return entries.map((entry) =>
    entry.type === 'dir' ? `${'  '.repeat(entry.depth)}📁 ${entry.name}/` : `${'  '.repeat(entry.depth)}📄 ${entry.name}`
  );
}

export function isKeyFile(entry: VisibleEntry): boolean {
  if (entry.type !== 'file' || entry.size >= MAX_KEY_FILE_BYTES) return false;
  const extension = extensionOf(entry.name);
  return CODE_EXTENSIONS.has(extension) || DOC_EXTENSIONS.has(extension) || MANIFEST_NAMES.has(entry.name);
}

/** Markdown and HTML image links, resolved against the default branch for relative paths. */
export function extractReadmeImageUrls(readme: string, fullName: string): string[] {
  const urls: string[] = [];
  const patterns = [/!\[[^\]]*\]\(\s*<?([^)\s>]+)>?[^)]*\)/g, /<img[^>]+src=["']([^"']+)["']/gi];
  for (const pattern of patterns) {
    for (const match of readme.matchAll(pattern)) {
      const link = match[1];
      if (/^https?:\/\//i.test(link)) {
        urls.push(link);
      } else if (!link.startsWith('data:')) {
        urls.push(`https://raw.githubusercontent.com/${fullName}/HEAD/${link.replace(/^\.?\//, '')}`);
      }
    }
  }
  return [...new Set(urls)];
}

export class RepositoryAdapter implements ArtifactAdapter<RepositoryResult> {
  readonly profile = PROJECT_PROFILE;
  /** README read while building content, handed to the image pass that follows it */
  private lastReadme: { fullName: string; readme: string } | null = null;

  constructor(private readonly github: RepositoryContentSource) {}

  async buildAnalysisContent(repo: RepositoryResult): Promise<string> {
    const readme = await this.github.getReadme(repo.title);
    this.lastReadme = { fullName: repo.title, readme };
    const entries = visibleEntries(await this.github.getTree(repo.title));
    const structure = formatStructure(entries).slice(0, STRUCTURE_LINES);

    let content =
      `# 项目: ${repo.title}\n## 描述\n${repo.description}\n## README\n${readme.slice(0, README_CHARS)}\n` +
      `## 项目结构\n${structure.join('\n')}\n## 关键代码文件\n`;

    for (const file of await this.readKeyFiles(repo.title, entries)) {
      content += `\n### ${file.path}\n\`\`\`\n${file.content.slice(0, KEY_FILE_CHARS)}\n\`\`\`\n`;
    }
    return content;
  }

  async extractImages(repo: RepositoryResult, maxImages: number): Promise<ImageReference[]> {
    if (maxImages <= 0) return [];
    const readme = await this.takeReadme(repo.title);
    return collectImages(extractReadmeImageUrls(readme, repo.title), maxImages);
  }

  private async takeReadme(fullName: string): Promise<string> {
    const cached = this.lastReadme;
    if (cached?.fullName === fullName) {
      this.lastReadme = null;
      return cached.readme;
    }
    return this.github.getReadme(fullName);
  }

  private async readKeyFiles(fullName: string, entries: readonly VisibleEntry[]): Promise<Array<{ path: string; content: string }>> {
    const files: Array<{ path: string; content: string }> = [];
    for (const entry of entries.filter(isKeyFile)) {
      if (files.length >= KEY_FILE_COUNT) break;
      try {
        files.push({ path: entry.path, content: await this.github.getFileContent(fullName, entry.path) });
      } catch (error) {
        log({ level: 'warn', component: 'RepositoryAdapter', message: `Skipping ${entry.path}: ${errorMessage(error)}` });
      }
    }
    return files;
  }
}
