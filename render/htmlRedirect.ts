import { decodeHTML } from 'entities';

export type RedirectMatcher = {
  name: string;
  match: (html: string) => string | undefined;
};

/** Substrings that mark a bare URL as a likely direct audio or file download. */
export const DIRECT_AUDIO_HINTS = [
  'download.aspx',
  '.files.1drv.com',
  '.download.',
  '.mp3',
  '.wav',
  '.flac',
  '.m4a',
  'drive.google.com/uc',
  'googleusercontent.com'
];

const SCRIPT_REDIRECT_REGEX =
  /window\.location(?:\.replace|\.assign|\.href)?\s*(?:\(\s*|=\s*)['"]([^'"]+)['"]/i;
const META_REFRESH_REGEX = /content\s*=\s*"\d+;\s*url=([^"]+)"/i;
const DRIVE_ANCHOR_REGEX = /href="(https:\/\/drive\.google\.com\/uc\?[^"]+)"/i;
const JSON_DOWNLOAD_URL_REGEX = /"downloadUrl":"(https:[^"]+)"/i;
const USER_CONTENT_DATA_URL_REGEX = /data-url="(https:\/\/[^"]+googleusercontent\.com[^"]+)"/i;
const CONFIRM_FIELD_REGEX = /name=["']confirm["']\s+value=["']([^"']+)["']/i;
const ID_FIELD_REGEX = /name=["']id["']\s+value=["']([^"']+)["']/i;
const BARE_URL_REGEX = /https?:\/\/[^\s"'<>]+/gi;

function firstGroup(regex: RegExp, html: string): string | undefined {
  const match = regex.exec(html);
  return match ? cleanCandidate(match[1]) : undefined;
}

export const scriptRedirect: RedirectMatcher = {
  name: 'script-redirect',
  match: (html) => firstGroup(SCRIPT_REDIRECT_REGEX, html)
};

export const metaRefresh: RedirectMatcher = {
  name: 'meta-refresh',
  match: (html) => firstGroup(META_REFRESH_REGEX, html)
};

export const driveAnchor: RedirectMatcher = {
  name: 'drive-anchor',
  match: (html) => firstGroup(DRIVE_ANCHOR_REGEX, html)
};

export const jsonDownloadUrl: RedirectMatcher = {
  name: 'json-download-url',
  match: (html) => firstGroup(JSON_DOWNLOAD_URL_REGEX, html)
};

export const userContentDataUrl: RedirectMatcher = {
  name: 'user-content-data-url',
  match: (html) => firstGroup(USER_CONTENT_DATA_URL_REGEX, html)
};

// Large Drive files answer with a virus-scan warning form instead of the bytes.
export const driveConfirmForm: RedirectMatcher = {
  name: 'drive-confirm-form',
  match: (html) => {
    const confirmToken = firstGroup(CONFIRM_FIELD_REGEX, html);
    const fileId = firstGroup(ID_FIELD_REGEX, html);
    if (!confirmToken || !fileId) {
      return undefined;
    }
    const query = new URLSearchParams({ export: 'download', confirm: confirmToken, id: fileId });
    return `https://drive.google.com/uc?${query.toString()}`;
  }
};

export const hintedBareUrl: RedirectMatcher = {
  name: 'hinted-bare-url',
  match: (html) => {
    for (const match of html.matchAll(BARE_URL_REGEX)) {
      const cleaned = cleanCandidate(match[0]);
      const lowered = cleaned.toLowerCase();
      if (DIRECT_AUDIO_HINTS.some((hint) => lowered.includes(hint))) {
        return cleaned;
      }
    }
    return undefined;
  }
};

/** Ordered from most to least structured; the first hit wins. */
export const REDIRECT_MATCHERS: readonly RedirectMatcher[] = [
  scriptRedirect,
  metaRefresh,
  driveAnchor,
  jsonDownloadUrl,
  userContentDataUrl,
  driveConfirmForm,
  hintedBareUrl
];

export function findRedirectCandidate(
  html: string
): { matcher: string; url: string } | undefined {
  for (const matcher of REDIRECT_MATCHERS) {
    const url = matcher.match(html);
    if (url) {
      return { matcher: matcher.name, url };
    }
  }
  return undefined;
}

export function extractDirectAudioUrl(html: string): string | undefined {
  return findRedirectCandidate(html)?.url;
}

export function cleanCandidate(candidate: string): string {
  const decoded = decodeHTML(candidate);
  try {
    return decodeEscapeSequences(decoded);
  } catch {
    return decoded;
  }
}

const SIMPLE_ESCAPES: Record<string, string> = {
  n: '\n',
  r: '\r',
  t: '\t',
  '\\': '\\',
  '/': '/',
  '"': '"',
  "'": "'"
};

/**
 * Decodes backslash escapes as they appear in inline scripts and JSON blobs.
 * Throws on a truncated `\u` or `\x` escape; unknown escapes are kept verbatim.
 */
export function decodeEscapeSequences(value: string): string {
  if (!value.includes('\\')) {
    return value;
  }

  return value.replace(/\\(u[0-9a-fA-F]{0,4}|x[0-9a-fA-F]{0,2}|[\s\S]?)/g, (whole, body: string) => {
    if (body.startsWith('u')) {
      if (body.length !== 5) {
        throw new SyntaxError(`Truncated \\u escape in "${value}"`);
      }
      return String.fromCharCode(Number.parseInt(body.slice(1), 16));
    }

    if (body.startsWith('x')) {
      if (body.length !== 3) {
        throw new SyntaxError(`Truncated \\x escape in "${value}"`);
      }
      return String.fromCharCode(Number.parseInt(body.slice(1), 16));
    }

    if (body === '') {
      throw new SyntaxError(`Trailing backslash in "${value}"`);
    }

    return SIMPLE_ESCAPES[body] ?? whole;
  });
}
