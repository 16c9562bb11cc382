import { MalformedURLError } from '../errors/export.errors';

/**
 * Page Reference Value Object
 * Identifies one wiki page by the parts the export endpoint needs
 */
export interface PageReferenceProps {
  url: string;
  siteBaseUrl: string;
  pageId: string;
  spaceKey?: string;
  titleSlug?: string;
}

const PAGE_PATH_PATTERN = /\/pages\/(\d+)(?=\/|$)(?:\/([^/]+))?/;
const SPACE_PATH_PATTERN = /\/spaces\/([^/]+)\//;
const VIEW_PAGE_ACTION = '/pages/viewpage.action';
const NUMERIC_ID = /^\d+$/;

export class PageReference {
  private constructor(private readonly props: Readonly<PageReferenceProps>) {
    Object.freeze(this);
  }

  /**
   * Parses a page URL such as
   * `https://example.atlassian.net/wiki/spaces/DOCS/pages/123456/Release+Notes`
   * or `https://wiki.example.com/pages/viewpage.action?pageId=123456`.
   *
   * @throws MalformedURLError when no numeric page ID can be found
   */
  static parse(pageUrl: string): PageReference {
    const raw = pageUrl.trim();

    let parsed: URL;
    try {
      parsed = new URL(raw);
    } catch {
      throw new MalformedURLError(pageUrl, 'not an absolute URL');
    }

    if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
      throw new MalformedURLError(pageUrl, `unsupported protocol ${parsed.protocol}`);
    }

    const spaceKey = SPACE_PATH_PATTERN.exec(parsed.pathname)?.[1];

    if (parsed.pathname.endsWith(VIEW_PAGE_ACTION)) {
      const pageId = parsed.searchParams.get('pageId') ?? '';
      if (!NUMERIC_ID.test(pageId)) {
        throw new MalformedURLError(pageUrl, 'viewpage.action without a numeric pageId');
      }
      return new PageReference({ url: raw, siteBaseUrl: parsed.origin, pageId, spaceKey });
    }

    const match = PAGE_PATH_PATTERN.exec(parsed.pathname);
    if (!match) {
      throw new MalformedURLError(pageUrl, 'path has no /pages/<id> segment');
    }

    return new PageReference({
      url: raw,
      siteBaseUrl: parsed.origin,
      pageId: match[1],
      spaceKey,
      titleSlug: match[2],
    });
  }

  get url(): string {
    return this.props.url;
  }

  get siteBaseUrl(): string {
    return this.props.siteBaseUrl;
  }

  get pageId(): string {
    return this.props.pageId;
  }

  get spaceKey(): string | undefined {
    return this.props.spaceKey;
  }

  get titleSlug(): string | undefined {
    return this.props.titleSlug;
  }

  /**
   * File name for the exported PDF, built from the title segment of the URL
   * and falling back to the page ID.
   */
  suggestedFileName(): string {
    const title = this.titleSlug ? sanitizeFileName(this.titleSlug) : '';
    return `${title.replace(/_/g, '').length > 0 ? title : this.pageId}.pdf`;
  }

  toJSON(): PageReferenceProps {
    return { ...this.props };
  }

  toString(): string {
    return this.props.url;
  }
}

/**
 * Decodes a URL path segment and replaces anything that is not a letter,
 * digit, underscore or hyphen with an underscore.
 */
export function sanitizeFileName(segment: string): string {
  let decoded: string;
  try {
    decoded = decodeURIComponent(segment);
  } catch {
    decoded = segment;
  }
  return decoded.replace(/[^\p{L}\p{N}_-]/gu, '_');
}
