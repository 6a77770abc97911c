import * as cheerio from 'cheerio';
import { normalizeWhitespace } from '../../utils/text';
import type { DiscoveryBackend, RawHit } from '../discovery';

const DUCKDUCKGO_HTML_ENDPOINT = 'https://html.duckduckgo.com/html/';

const USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/122.0 Safari/537.36';

// kp=-2 turns safe search off
const SAFE_SEARCH_OFF = '-2';

// about 10 organic hits per page
const MAX_PAGES = 5;

/** Unwraps DuckDuckGo's `/l/?uddg=` redirect links to the publisher URL. */
export const resolveResultHref = (href: string): string => {
  if (!href.includes('uddg=')) {
    return href;
  }
  try {
    const parsed = new URL(href, 'https://duckduckgo.com');
    return parsed.searchParams.get('uddg') || href;
  } catch {
    return href;
  }
};

export const parseDuckDuckGoHtml = (html: string, maxResults: number): RawHit[] => {
  const $ = cheerio.load(html);
  const hits: RawHit[] = [];

  $('.result').each((_, element) => {
    if (hits.length >= maxResults) {
      return false;
    }
    const result = $(element);
    if (result.hasClass('result--ad')) {
      return undefined;
    }
    const anchor = result.find('.result__a').first();
    if (!anchor.length) {
      return undefined;
    }
    hits.push({
      title: normalizeWhitespace(anchor.text()),
      link: resolveResultHref(anchor.attr('href') ?? ''),
      snippet: normalizeWhitespace(result.find('.result__snippet').first().text()),
    });
    return undefined;
  });

  return hits;
};

/**
 * Reads the hidden fields of the "Next" form at the foot of a results page.
 * Returns null on the last page.
 */
export const parseNextPageForm = (html: string): URLSearchParams | null => {
  const $ = cheerio.load(html);
  const form = $('.nav-link form')
    .filter((_, element) => ($(element).find('input[type="submit"]').attr('value') ?? '').trim().toLowerCase() === 'next')
    .first();
  if (!form.length) {
    return null;
  }
  const params = new URLSearchParams();
  form.find('input[type="hidden"]').each((_, input) => {
    const name = $(input).attr('name');
    if (name) {
      params.append(name, $(input).attr('value') ?? '');
    }
  });
  return params.has('q') ? params : null;
};

export const createDuckDuckGoBackend = (): DiscoveryBackend => {
  const postPage = async (form: URLSearchParams, signal: AbortSignal): Promise<string> => {
    const response = await fetch(DUCKDUCKGO_HTML_ENDPOINT, {
      method: 'POST',
      headers: {
        'User-Agent': USER_AGENT,
        'Content-Type': 'application/x-www-form-urlencoded',
        Accept: 'text/html',
      },
      body: form.toString(),
      signal,
    });

    if (!response.ok) {
      throw new Error(`duckduckgo search failed: HTTP ${response.status}`);
    }
    return response.text();
  };

  return {
    name: 'duckduckgo',
    async search(query, options) {
      const hits: RawHit[] = [];
      const seen = new Set<string>();
      let form: URLSearchParams | null = new URLSearchParams({ q: query, kl: options.region, kp: SAFE_SEARCH_OFF });

      for (let page = 0; form && page < MAX_PAGES && hits.length < options.maxResults; page += 1) {
        const html = await postPage(form, options.signal);
        let added = 0;
        for (const hit of parseDuckDuckGoHtml(html, Number.POSITIVE_INFINITY)) {
          if (hits.length >= options.maxResults) break;
          const link = hit.link ?? '';
          if (link && seen.has(link)) continue;
          seen.add(link);
          hits.push(hit);
          added += 1;
        }
        if (added === 0) break;

        form = parseNextPageForm(html);
        // later pages keep the caller's region and safe-search setting
        form?.set('kl', options.region);
        form?.set('kp', SAFE_SEARCH_OFF);
      }

      return hits;
    },
  };
};
