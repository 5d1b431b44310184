import { afterEach, describe, expect, it, vi } from 'vitest';
import { SearchSourceError } from '../../apps/api/src/services/errors';
import { ArxivClient, buildArxivQuery, parseArxivFeed } from '../../apps/api/src/services/search/arxiv';
import { GithubClient } from '../../apps/api/src/services/search/github';
import { HuggingFaceClient } from '../../apps/api/src/services/search/huggingface';
import { ModelScopeClient, modelPathFromUrl } from '../../apps/api/src/services/search/modelscope';

type FetchInput = string | URL | Request;

const WINDOW = { start: new Date('2024-01-01T00:00:00Z'), end: new Date('2024-03-31T12:00:00Z') };

function stubFetch(handler: (url: string, init?: RequestInit) => Response) {
  const fetchMock = vi.fn(async (input: FetchInput, init?: RequestInit) => handler(String(input), init));
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'content-type': 'application/json' } });
}

function atomEntry(id: string, published: string, title = `Paper ${id}`): string {
  return `<entry><id>http://arxiv.org/abs/${id}v1</id><published>${published}</published><title>${title}</title><summary>s</summary></entry>`;
}

const FEED = `<?xml version="1.0" encoding="UTF-8"?>
<feed xmlns="http://www.w3.org/2005/Atom">
  <title>ArXiv Query</title>
  <entry>
    <id>http://arxiv.org/abs/2403.01234v2</id>
    <published>2024-03-02T10:00:00Z</published>
    <title>Graph  Neural
      Networks &amp; Friends</title>
    <summary>  We study
      graphs.  </summary>
    <author><name>Alice Example</name></author>
    <author><name>Bob Example</name></author>
    <link href="http://arxiv.org/abs/2403.01234v2" rel="alternate" type="text/html"/>
    <link title="pdf" href="http://arxiv.org/pdf/2403.01234v2" rel="related" type="application/pdf"/>
    <category term="cs.LG" scheme="http://arxiv.org/schemas/atom"/>
    <category term="stat.ML" scheme="http://arxiv.org/schemas/atom"/>
  </entry>
  ${atomEntry('2301.00001', '2023-01-05T00:00:00Z')}
  <entry><id>http://arxiv.org/abs/2403.09999v1</id><published>2024-03-03T00:00:00Z</published></entry>
</feed>`;

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('ArxivClient', () => {
  it('should AND every term and bound the submission date', () => {
    expect(buildArxivQuery('  C++  agents ', WINDOW)).toBe(
      'all:C%2B%2B+AND+all:agents+AND+submittedDate:%5B202401010000+TO+202403312359%5D'
    );
  });

  it('should parse entries and skip those missing a title', () => {
    const entries = parseArxivFeed(FEED);

    expect(entries).toHaveLength(2);
    expect(entries[0].paper).toEqual({
      kind: 'paper',
      source: 'arxiv',
      title: 'Graph Neural Networks & Friends',
      url: 'https://arxiv.org/abs/2403.01234',
      authors: ['Alice Example', 'Bob Example'],
      abstract: 'We study graphs.',
      published: '2024-03-02',
      pdfUrl: 'http://arxiv.org/pdf/2403.01234v2',
      categories: ['cs.LG', 'stat.ML'],
    });
  });

  it('should keep only papers inside the window', async () => {
    const fetchMock = stubFetch(() => new Response(FEED, { status: 200 }));

    const papers = await new ArxivClient().search('graph neural', WINDOW, 5);

    expect(papers.map((paper) => paper.url)).toEqual(['https://arxiv.org/abs/2403.01234']);
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(fetchMock.mock.calls[0][0]).toBe(
      'https://export.arxiv.org/api/query?search_query=all:graph+AND+all:neural+AND+submittedDate:%5B202401010000+TO+202403312359%5D' +
        '&start=0&max_results=5&sortBy=submittedDate&sortOrder=descending'
    );
  });

  it('should page in batches of fifty until the limit is met or a batch runs short', async () => {
    const fetchMock = stubFetch((url) => {
      const start = Number(new URL(url).searchParams.get('start'));
      const count = start === 0 ? 50 : 3;
      const entries = Array.from({ length: count }, (_, index) => atomEntry(`2403.${start + index}`, '2024-03-01T00:00:00Z'));
      return new Response(`<feed>${entries.join('')}</feed>`, { status: 200 });
    });

    const papers = await new ArxivClient().search('agents', WINDOW, 60);

    expect(papers).toHaveLength(53);
    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(String(fetchMock.mock.calls[1][0])).toContain('&start=50&max_results=10&');
  });

  it('should raise a source error for a failed request', async () => {
    stubFetch(() => new Response('', { status: 503, statusText: 'Service Unavailable' }));

    const search = new ArxivClient().search('agents', WINDOW, 5);

    await expect(search).rejects.toBeInstanceOf(SearchSourceError);
    await expect(search).rejects.toThrow('arxiv: HTTP 503 Service Unavailable');
  });
});

describe('GithubClient', () => {
  const repository = {
    full_name: 'owner/agent-kit',
    description: null,
    html_url: 'https://github.com/owner/agent-kit',
    stargazers_count: 42,
    language: 'TypeScript',
    topics: ['agents'],
    updated_at: '2024-03-10T08:00:00Z',
    default_branch: 'develop',
  };

  it('should search repositories pushed inside the window', async () => {
    const fetchMock = stubFetch(() => json({ items: [repository, { ...repository, full_name: 'owner/other' }, repository] }));

    const results = await new GithubClient({ token: 'test-token' }).search('llm agents', WINDOW, 2);

    expect(results).toEqual([
      {
        kind: 'repository',
        source: 'github',
        title: 'owner/agent-kit',
        url: 'https://github.com/owner/agent-kit',
        description: '',
        stars: 42,
        language: 'TypeScript',
        topics: ['agents'],
        updated: '2024-03-10',
      },
      expect.objectContaining({ title: 'owner/other' }),
    ]);
    const [url, init] = fetchMock.mock.calls[0];
    const params = new URL(String(url)).searchParams;
    expect(params.get('q')).toBe('llm agents pushed:2024-01-01..2024-03-31');
    expect(params.get('sort')).toBe('stars');
    expect(new Headers(init?.headers).get('Authorization')).toBe('Bearer test-token');
  });

  it('should decode README content and treat a missing README as empty', async () => {
    stubFetch((url) =>
      url.endsWith('/repos/owner/with-readme/readme')
        ? json({ content: Buffer.from('# Hello').toString('base64'), encoding: 'base64' })
        : new Response('', { status: 404 })
    );
    const client = new GithubClient();

    await expect(client.getReadme('owner/with-readme')).resolves.toBe('# Hello');
    await expect(client.getReadme('owner/none')).resolves.toBe('');
  });

  it('should list the tree of the default branch', async () => {
    const fetchMock = stubFetch((url) =>
      url.includes('/git/trees/')
        ? json({
            tree: [
              { path: 'src', type: 'tree' },
              { path: 'src/index.ts', type: 'blob', size: 120 },
            ],
          })
        : json(repository)
    );

    await expect(new GithubClient().getTree('owner/agent-kit')).resolves.toEqual([
      { path: 'src', type: 'dir', size: 0 },
      { path: 'src/index.ts', type: 'file', size: 120 },
    ]);
    expect(fetchMock.mock.calls[1][0]).toBe('https://api.github.com/repos/owner/agent-kit/git/trees/develop?recursive=1');
  });
});

describe('HuggingFaceClient', () => {
  it('should over-fetch and drop models modified outside the window', async () => {
    const fetchMock = stubFetch(() =>
      json([
        {
          id: 'org/recent',
          lastModified: '2024-03-10T00:00:00.000Z',
          pipeline_tag: 'text-generation',
          library_name: 'transformers',
          tags: ['t1'],
          downloads: 10,
          likes: 2,
        },
        { id: 'org/old', lastModified: '2022-01-01T00:00:00.000Z' },
        { id: 'org/undated' },
      ])
    );

    const results = await new HuggingFaceClient().search('summarization', WINDOW, 5);

    expect(results).toEqual([
      {
        kind: 'model',
        source: 'huggingface',
        title: 'org/recent',
        url: 'https://huggingface.co/org/recent',
        description: 'text-generation; transformers; tags: t1',
        downloads: 10,
        likes: 2,
        tags: ['t1'],
        updated: '2024-03-10',
      },
      expect.objectContaining({ title: 'org/undated', description: '', updated: undefined }),
    ]);
    expect(new URL(String(fetchMock.mock.calls[0][0])).searchParams.get('limit')).toBe('15');
  });

  it('should reject a malformed payload', async () => {
    stubFetch(() => json({ error: 'nope' }));
    await expect(new HuggingFaceClient().search('x', WINDOW, 5)).rejects.toBeInstanceOf(SearchSourceError);
  });
});

describe('ModelScopeClient', () => {
  const qwen = {
    Name: 'Qwen-7B',
    Path: 'qwen',
    ChineseName: '通义千问-7B',
    Description: '大模型',
    Downloads: 100,
    Stars: 5,
    Tasks: [{ Name: 'text-generation', ChineseName: '文本生成' }],
    Tags: ['llm'],
    LastUpdatedTime: 1704067200,
    ReadMeContent: '# Qwen',
  };

  it('should search by name with a PUT and map the hub fields', async () => {
    const fetchMock = stubFetch(() => json({ Data: { Model: { Models: [qwen] } } }));

    const results = await new ModelScopeClient().search('qwen', WINDOW, 10);

    expect(results).toEqual([
      {
        kind: 'model',
        source: 'modelscope',
        title: 'qwen/Qwen-7B',
        url: 'https://modelscope.cn/models/qwen/Qwen-7B',
        description: '通义千问-7B; 大模型; 文本生成',
        downloads: 100,
        likes: 5,
        tags: ['llm'],
        updated: '2024-01-01',
      },
    ]);
    const init = fetchMock.mock.calls[0][1];
    expect(init?.method).toBe('PUT');
    expect(JSON.parse(String(init?.body))).toMatchObject({ Name: 'qwen', PageSize: 10 });
  });

  it('should describe a model and tolerate a missing file list', async () => {
    stubFetch((url) => (url.includes('/repo/files') ? new Response('', { status: 500 }) : json({ Data: qwen })));

    await expect(new ModelScopeClient().getModelContent('qwen/Qwen-7B')).resolves.toEqual({
      modelInfo: '名称: 通义千问-7B\n描述: 大模型\n任务: 文本生成\n下载量: 100\n收藏: 5',
      readme: '# Qwen',
      files: [],
    });
  });

  it('should recover the model path from its page URL', () => {
    expect(modelPathFromUrl('https://modelscope.cn/models/qwen/Qwen-7B')).toBe('qwen/Qwen-7B');
  });
});
