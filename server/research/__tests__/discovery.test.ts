import { afterEach, describe, expect, it, vi } from 'vitest';
import { createNoopLogger } from '../../obs/logger';
import { createDuckDuckGoBackend, parseDuckDuckGoHtml, parseNextPageForm, resolveResultHref } from '../backends/duckduckgo';
import { createDiscoveryClient, DiscoveryError, toCandidates, type DiscoveryBackend, type RawHit } from '../discovery';
import { recordingSleep, testConfig } from './fixtures';

const RESULTS_HTML = `
  <html><body>
    <div class="result result--ad">
      <a class="result__a" href="https://ads.example/buy">Sponsored</a>
      <a class="result__snippet">Buy now.</a>
    </div>
    <div class="result">
      <h2><a class="result__a" href="//duckduckgo.com/l/?uddg=https%3A%2F%2Fen.wikipedia.org%2Fwiki%2FParis&amp;rut=abc">Paris - Wikipedia</a></h2>
      <a class="result__snippet">Paris is the capital and largest city of France.</a>
    </div>
    <div class="result">
      <h2><a class="result__a" href="https://www.britannica.com/place/Paris">Paris | History &amp; Facts</a></h2>
      <a class="result__snippet">  Paris, city and capital of France.  </a>
    </div>
    <div class="result"><div class="no-anchor">Nothing here</div></div>
    <div class="result">
      <h2><a class="result__a" href="https://example.org/third">Third</a></h2>
    </div>
  </body></html>
`;

const resultBlock = (slug: string) => `
    <div class="result">
      <h2><a class="result__a" href="https://example.com/${slug}">Page ${slug}</a></h2>
      <a class="result__snippet">About ${slug}.</a>
    </div>`;

const navForm = (label: string, offset: number) => `
    <div class="nav-link">
      <form action="/html/" method="post">
        <input type="submit" class="btn" value="${label}" />
        <input type="hidden" name="q" value="paris" />
        <input type="hidden" name="s" value="${offset}" />
        <input type="hidden" name="dc" value="${offset + 1}" />
        <input type="hidden" name="vqd" value="test-token" />
        <input type="hidden" name="kl" value="wt-wt" />
      </form>
    </div>`;

const PAGE_ONE = `<html><body>${resultBlock('a')}${resultBlock('b')}${navForm('Next', 10)}</body></html>`;
const PAGE_TWO = `<html><body>${resultBlock('b')}${resultBlock('c')}${resultBlock('d')}${navForm('Previous', 0)}${navForm('Next', 30)}</body></html>`;
const EMPTY_PAGE = '<html><body><div class="no-results">No results.</div></body></html>';

describe('parseDuckDuckGoHtml', () => {
  it('extracts organic hits in page order and unwraps redirect links', () => {
    expect(parseDuckDuckGoHtml(RESULTS_HTML, 10)).toEqual([
      {
        title: 'Paris - Wikipedia',
        link: 'https://en.wikipedia.org/wiki/Paris',
        snippet: 'Paris is the capital and largest city of France.',
      },
      {
        title: 'Paris | History & Facts',
        link: 'https://www.britannica.com/place/Paris',
        snippet: 'Paris, city and capital of France.',
      },
      { title: 'Third', link: 'https://example.org/third', snippet: '' },
    ]);
  });

  it('collapses markup whitespace inside titles and snippets', () => {
    const html = `<div class="result"><a class="result__a" href="https://example.com/x">Line
      <b>one</b></a><a class="result__snippet">A&nbsp;snippet
      over   lines</a></div>`;
    expect(parseDuckDuckGoHtml(html, 5)).toEqual([
      { title: 'Line one', link: 'https://example.com/x', snippet: 'A snippet over lines' },
    ]);
  });

  it('stops at maxResults', () => {
    expect(parseDuckDuckGoHtml(RESULTS_HTML, 1)).toHaveLength(1);
  });

  it('leaves direct links untouched', () => {
    expect(resolveResultHref('https://example.com/a?b=1')).toBe('https://example.com/a?b=1');
  });
});

describe('parseNextPageForm', () => {
  it('reads the hidden fields of the Next form and ignores Previous', () => {
    expect(parseNextPageForm(PAGE_TWO)?.toString()).toBe('q=paris&s=30&dc=31&vqd=test-token&kl=wt-wt');
  });

  it('returns null on the last page', () => {
    expect(parseNextPageForm(RESULTS_HTML)).toBeNull();
  });
});

describe('createDuckDuckGoBackend', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('posts the query with region and safe search off', async () => {
    const fetchMock = vi.fn(
      async (_input: string | URL | Request, _init?: RequestInit) =>
        new Response(RESULTS_HTML, { status: 200, headers: { 'content-type': 'text/html' } }),
    );
    vi.stubGlobal('fetch', fetchMock);

    const hits = await createDuckDuckGoBackend().search('capital of France', {
      region: 'in-en',
      maxResults: 2,
      safeSearch: 'off',
      signal: new AbortController().signal,
    });

    expect(hits).toHaveLength(2);
    expect(fetchMock.mock.calls[0][0]).toBe('https://html.duckduckgo.com/html/');
    expect(fetchMock.mock.calls[0][1]?.method).toBe('POST');
    expect(fetchMock.mock.calls[0][1]?.body).toBe('q=capital+of+France&kl=in-en&kp=-2');
  });

  it('follows the next page until maxResults and skips repeated links', async () => {
    const pages = [PAGE_ONE, PAGE_TWO];
    const fetchMock = vi.fn(
      async (_input: string | URL | Request, _init?: RequestInit) =>
        new Response(pages.shift() ?? EMPTY_PAGE, { status: 200 }),
    );
    vi.stubGlobal('fetch', fetchMock);

    const hits = await createDuckDuckGoBackend().search('paris', {
      region: 'in-en',
      maxResults: 3,
      safeSearch: 'off',
      signal: new AbortController().signal,
    });

    expect(hits.map((hit) => hit.link)).toEqual([
      'https://example.com/a',
      'https://example.com/b',
      'https://example.com/c',
    ]);
    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(fetchMock.mock.calls[1][1]?.body).toBe('q=paris&s=10&dc=11&vqd=test-token&kl=in-en&kp=-2');
  });

  it('stops paging when a page adds no hits', async () => {
    const pages = [PAGE_ONE, EMPTY_PAGE];
    const fetchMock = vi.fn(async () => new Response(pages.shift() ?? EMPTY_PAGE, { status: 200 }));
    vi.stubGlobal('fetch', fetchMock);

    const hits = await createDuckDuckGoBackend().search('paris', {
      region: 'in-en',
      maxResults: 20,
      safeSearch: 'off',
      signal: new AbortController().signal,
    });

    expect(hits).toHaveLength(2);
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it('throws on a non-ok response', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async () => new Response('unavailable', { status: 503 })),
    );

    await expect(
      createDuckDuckGoBackend().search('q', {
        region: 'in-en',
        maxResults: 5,
        safeSearch: 'off',
        signal: new AbortController().signal,
      }),
    ).rejects.toThrow('duckduckgo search failed: HTTP 503');
  });
});

describe('toCandidates', () => {
  it('assigns 1-based ranks, fills blanks and truncates snippets', () => {
    const hits: RawHit[] = [
      { title: 'First', link: 'https://a.example', snippet: 'abcdefghij' },
      { title: null, link: undefined, snippet: null },
      { title: 'Third', link: 'https://c.example', snippet: 'xyz' },
    ];

    expect(toCandidates(hits, 2, 5)).toEqual([
      { rank: 1, title: 'First', link: 'https://a.example', snippet: 'abcde' },
      { rank: 2, title: '', link: '', snippet: '' },
    ]);
  });
});

describe('createDiscoveryClient', () => {
  const fakeBackend = (search: DiscoveryBackend['search']): DiscoveryBackend => ({ name: 'fake', search });

  it('returns candidates using the configured region and limit', async () => {
    const search = vi.fn(async () => [{ title: 'Paris', link: 'https://paris.example', snippet: 'Capital of France' }]);
    const client = createDiscoveryClient({
      config: testConfig().discovery,
      backend: fakeBackend(search),
      logger: createNoopLogger(),
    });

    const candidates = await client.discover('capital of France');

    expect(candidates).toEqual([{ rank: 1, title: 'Paris', link: 'https://paris.example', snippet: 'Capital of France' }]);
    expect(search).toHaveBeenCalledWith(
      'capital of France',
      expect.objectContaining({ region: 'in-en', maxResults: 20, safeSearch: 'off' }),
    );
  });

  it('retries a failing backend with linear backoff', async () => {
    const { delays, sleep } = recordingSleep();
    const search = vi
      .fn<DiscoveryBackend['search']>()
      .mockRejectedValueOnce(new Error('connection reset'))
      .mockResolvedValueOnce([{ title: 'ok', link: 'https://ok.example', snippet: '' }]);
    const client = createDiscoveryClient({
      config: testConfig().discovery,
      backend: fakeBackend(search),
      logger: createNoopLogger(),
      sleep,
    });

    const candidates = await client.discover('anything', 'us-en', 5);

    expect(candidates).toHaveLength(1);
    expect(search).toHaveBeenCalledTimes(2);
    expect(search).toHaveBeenLastCalledWith('anything', expect.objectContaining({ region: 'us-en', maxResults: 5 }));
    expect(delays).toEqual([200]);
  });

  it('raises a DiscoveryError after three failed attempts', async () => {
    const { delays, sleep } = recordingSleep();
    const search = vi.fn<DiscoveryBackend['search']>().mockRejectedValue(new Error('backend down'));
    const client = createDiscoveryClient({
      config: testConfig().discovery,
      backend: fakeBackend(search),
      logger: createNoopLogger(),
      sleep,
    });

    const failure = await client.discover('anything').catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(DiscoveryError);
    if (failure instanceof DiscoveryError) {
      expect(failure.attempts).toBe(3);
      expect(failure.message).toBe('fake search failed after 3 attempts: backend down');
    }
    expect(search).toHaveBeenCalledTimes(3);
    expect(delays).toEqual([200, 400]);
  });

  it('times out a backend that never answers', async () => {
    const search = vi.fn<DiscoveryBackend['search']>(() => new Promise<RawHit[]>(() => {}));
    const client = createDiscoveryClient({
      config: testConfig({ DISCOVERY_TIMEOUT_MS: '20', DISCOVERY_RETRIES: '0' }).discovery,
      backend: fakeBackend(search),
      logger: createNoopLogger(),
    });

    await expect(client.discover('anything')).rejects.toThrow('fake search failed after 1 attempt: Timed out after 20ms');
  });
});
