import type { ModelHubResult, PaperResult, RepositoryResult } from '@radar/shared';

export function paper(title: string, overrides: Partial<PaperResult> = {}): PaperResult {
  return {
    kind: 'paper',
    source: 'arxiv',
    title,
    url: `https://arxiv.org/abs/${title.replace(/\s+/g, '-')}`,
    authors: ['Alice Example', 'Bob Example'],
    abstract: `abstract of ${title}`,
    published: '2024-03-01',
    categories: ['cs.CL'],
    ...overrides,
  };
}

export function repo(title: string, overrides: Partial<RepositoryResult> = {}): RepositoryResult {
  return {
    kind: 'repository',
    source: 'github',
    title,
    url: `https://github.com/${title}`,
    description: `description of ${title}`,
    stars: 10,
    language: 'Python',
    topics: [],
    updated: '2024-03-01',
    ...overrides,
  };
}

export function model(title: string, overrides: Partial<ModelHubResult> = {}): ModelHubResult {
  return {
    kind: 'model',
    source: 'huggingface',
    title,
    url: `https://huggingface.co/${title}`,
    description: `description of ${title}`,
    downloads: 100,
    likes: 5,
    tags: [],
    ...overrides,
  };
}
