import { afterEach, describe, expect, it, vi } from 'vitest';
import type { ImageReference } from '@radar/shared';
import { createArtifactAdapters, prepareArtifact } from '../../apps/api/src/services/artifacts';
import { collectImages, fetchImageAsDataUrl } from '../../apps/api/src/services/artifacts/images';
import { PaperAdapter, buildPaperContent } from '../../apps/api/src/services/artifacts/paper';
import {
  RepositoryAdapter,
  extractReadmeImageUrls,
  formatStructure,
  visibleEntries,
  type RepositoryContentSource,
} from '../../apps/api/src/services/artifacts/repository';
import { ModelHubAdapter } from '../../apps/api/src/services/artifacts/model-hub';
import { PAPER_PROFILE, PROJECT_PROFILE } from '../../apps/api/src/services/pipelines/content-analysis';
import type { ModelHubContent, ModelHubContentSource } from '../../apps/api/src/services/search/model-hub';
import type { TreeEntry } from '../../apps/api/src/services/search/github';
import { model, paper, repo } from '../helpers/fixtures';

const TREE: TreeEntry[] = [
  { path: 'src', type: 'dir', size: 0 },
  { path: 'src/main.py', type: 'file', size: 100 },
  { path: '.github', type: 'dir', size: 0 },
  { path: '.github/workflows/ci.yml', type: 'file', size: 50 },
  { path: 'README.md', type: 'file', size: 200 },
  { path: 'a/b/c/deep.py', type: 'file', size: 10 },
  { path: 'data.bin', type: 'file', size: 10 },
  { path: 'big.py', type: 'file', size: 60000 },
];

class FakeGithub implements RepositoryContentSource {
  readonly fileReads: string[] = [];
  readmeReads = 0;

  constructor(private readonly readme = '# Demo') {}

  async getReadme(): Promise<string> {
    this.readmeReads += 1;
    return this.readme;
  }

  async getTree(): Promise<TreeEntry[]> {
    return TREE;
  }

  async getFileContent(_fullName: string, path: string): Promise<string> {
    this.fileReads.push(path);
    if (path === 'README.md') throw new Error('HTTP 403');
    return `content of ${path}`;
  }
}

class FakeHub implements ModelHubContentSource {
  readonly requested: string[] = [];

  async getModelContent(modelId: string): Promise<ModelHubContent> {
    this.requested.push(modelId);
    return { modelInfo: '任务: text-generation', readme: 'model card', files: ['config.json', 'model.safetensors'] };
  }
}

function pngResponse(): Response {
  return new Response(new Uint8Array([1, 2, 3]), { status: 200, headers: { 'content-type': 'image/png' } });
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('PaperAdapter', () => {
  it('should build content from title, abstract and authors', () => {
    expect(buildPaperContent(paper('Graph Nets', { abstract: 'We study graphs.' }))).toBe(
      '标题: Graph Nets\n摘要: We study graphs.\n作者: Alice Example, Bob Example'
    );
  });

  it('should only ask the extractor when a PDF exists', async () => {
    const extract = vi.fn(async (_pdfUrl: string, _maxImages: number): Promise<ImageReference[]> => [{ url: 'a' }, { url: 'b' }, { url: 'c' }]);
    const adapter = new PaperAdapter({ extract });

    await expect(adapter.extractImages(paper('No PDF'), 3)).resolves.toEqual([]);
    await expect(adapter.extractImages(paper('With PDF', { pdfUrl: 'https://arxiv.org/pdf/1' }), 2)).resolves.toEqual([
      { url: 'a' },
      { url: 'b' },
    ]);
    expect(extract).toHaveBeenCalledTimes(1);
    expect(extract).toHaveBeenCalledWith('https://arxiv.org/pdf/1', 2);
  });

  it('should return no images without an extractor', async () => {
    await expect(new PaperAdapter().extractImages(paper('P', { pdfUrl: 'https://arxiv.org/pdf/1' }), 3)).resolves.toEqual(
      []
    );
  });
});

describe('RepositoryAdapter', () => {
  it('should keep shallow entries outside hidden directories', () => {
    expect(formatStructure(visibleEntries(TREE))).toEqual([
      '📁 src/',
      '  📄 main.py',
      '📄 README.md',
      '📄 data.bin',
      '📄 big.py',
    ]);
  });

  it('should assemble README, structure and readable key files', async () => {
    const github = new FakeGithub();

    const content = await new RepositoryAdapter(github).buildAnalysisContent(repo('owner/demo'));

    expect(github.fileReads).toEqual(['src/main.py', 'README.md']);
    expect(content).toBe(
      '# 项目: owner/demo\n## 描述\ndescription of owner/demo\n## README\n# Demo\n' +
        '## 项目结构\n📁 src/\n  📄 main.py\n📄 README.md\n📄 data.bin\n📄 big.py\n## 关键代码文件\n' +
        '\n### src/main.py\n```\ncontent of src/main.py\n```\n'
    );
  });

  it('should resolve README image links against the repository', () => {
    const readme =
      '![a](docs/arch.png)\n<img src="https://x.org/b.png">\n![b](./docs/arch.png)\n![c](data:image/png;base64,xx)';
    expect(extractReadmeImageUrls(readme, 'o/r')).toEqual([
      'https://raw.githubusercontent.com/o/r/HEAD/docs/arch.png',
      'https://x.org/b.png',
    ]);
  });

  it('should download README images up to the limit', async () => {
    const fetchMock = vi.fn(async (_input: string | URL | Request, _init?: RequestInit) => pngResponse());
    vi.stubGlobal('fetch', fetchMock);
    const adapter = new RepositoryAdapter(new FakeGithub('![a](https://x.org/1.png) ![b](https://x.org/2.png)'));

    const images = await adapter.extractImages(repo('o/r'), 1);

    expect(images).toEqual([{ url: 'data:image/png;base64,AQID' }]);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('should read the README once when preparing content and images', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => pngResponse()));
    const github = new FakeGithub('![a](https://x.org/1.png)');
    const adapters = createArtifactAdapters({ github, huggingface: new FakeHub(), modelscope: new FakeHub() });

    const first = await prepareArtifact(repo('o/r'), adapters, { maxImages: 2 });
    expect(first.images).toEqual([{ url: 'data:image/png;base64,AQID' }]);
    expect(github.readmeReads).toBe(1);

    await adapters.repository.extractImages(repo('o/r'), 2);
    expect(github.readmeReads).toBe(2);
  });
});

describe('ModelHubAdapter', () => {
  it('should describe a HuggingFace model by its title', async () => {
    const huggingface = new FakeHub();
    const adapter = new ModelHubAdapter({ huggingface, modelscope: new FakeHub() });

    const content = await adapter.buildAnalysisContent(model('org/tiny-llm'));

    expect(huggingface.requested).toEqual(['org/tiny-llm']);
    expect(content).toBe(
      '# HuggingFace模型: org/tiny-llm\n任务: text-generation\n## README\nmodel card\n## 文件列表\nconfig.json\nmodel.safetensors'
    );
  });

  it('should take the ModelScope path from the URL', async () => {
    const modelscope = new FakeHub();
    const adapter = new ModelHubAdapter({ huggingface: new FakeHub(), modelscope });

    await adapter.buildAnalysisContent(
      model('qwen/Qwen-7B', { source: 'modelscope', url: 'https://modelscope.cn/models/qwen/Qwen-7B' })
    );

    expect(modelscope.requested).toEqual(['qwen/Qwen-7B']);
  });
});

describe('prepareArtifact', () => {
  const adapters = createArtifactAdapters({
    github: new FakeGithub(),
    huggingface: new FakeHub(),
    modelscope: new FakeHub(),
  });

  it('should route papers to the paper profile', async () => {
    const prepared = await prepareArtifact(paper('P'), adapters, { maxImages: 0 });
    expect(prepared.profile).toBe(PAPER_PROFILE);
    expect(prepared.images).toEqual([]);
  });

  it('should route repositories and models to the project profile', async () => {
    expect((await prepareArtifact(repo('o/r'), adapters, { maxImages: 0 })).profile).toBe(PROJECT_PROFILE);
    expect((await prepareArtifact(model('m/x'), adapters, { maxImages: 3 })).profile).toBe(PROJECT_PROFILE);
  });
});

describe('image download', () => {
  it('should inline supported images as data URLs', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => pngResponse()));
    await expect(fetchImageAsDataUrl('https://x.org/a.png')).resolves.toEqual({ url: 'data:image/png;base64,AQID' });
  });

  it('should reject unsupported formats and failed responses', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async () => new Response('<svg/>', { status: 200, headers: { 'content-type': 'image/svg+xml' } }))
    );
    await expect(fetchImageAsDataUrl('https://x.org/badge.svg')).resolves.toBeNull();

    vi.stubGlobal('fetch', vi.fn(async () => new Response('missing', { status: 404 })));
    await expect(fetchImageAsDataUrl('https://x.org/gone.png')).resolves.toBeNull();
  });

  it('should skip images that fail to download', async () => {
    const fetchMock = vi
      .fn(async (_input: string | URL | Request, _init?: RequestInit) => pngResponse())
      .mockRejectedValueOnce(new Error('network down'));
    vi.stubGlobal('fetch', fetchMock);

    const images = await collectImages(['https://x.org/1.png', 'https://x.org/2.png', 'https://x.org/3.png'], 2);

    expect(images).toHaveLength(2);
    expect(fetchMock).toHaveBeenCalledTimes(3);
  });
});
