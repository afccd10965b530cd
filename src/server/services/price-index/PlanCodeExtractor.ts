import path from 'path';

export type PlanCodeFailure =
  | 'InvalidUrl'
  | 'NoFilename'
  | 'InsufficientSeparators'
  | 'InvalidSeparatorSpacing';

export type PlanCodeResult =
  | { ok: true; code: string }
  | { ok: false; reason: PlanCodeFailure };

const SEPARATOR = '_';

// Relative and scheme-less locations resolve against this; only the path is read
const PLACEHOLDER_BASE = 'http://localhost/';

function decodePath(pathname: string): string {
  try {
    return decodeURIComponent(pathname);
  } catch {
    // Malformed escapes stay as written
    return pathname;
  }
}

/**
 * Extract the region/plan code from a file location URL.
 *
 * The code is the part of the final filename segment strictly between the
 * first and third `_`, so `2024-01-01_301_71A0_in-network-rates.json`
 * yields `301_71A0`. Locations without a scheme are read as paths;
 * `InvalidUrl` is left for text that cannot be parsed at all, such as a
 * malformed host.
 */
export function extractPlanCode(rawUrl: string): PlanCodeResult {
  let url: URL;
  try {
    url = new URL(rawUrl, PLACEHOLDER_BASE);
  } catch {
    return { ok: false, reason: 'InvalidUrl' };
  }

  const filename = path.posix.basename(decodePath(url.pathname));
  if (filename === '' || filename === '/') {
    return { ok: false, reason: 'NoFilename' };
  }

  const first = filename.indexOf(SEPARATOR);
  const second = first === -1 ? -1 : filename.indexOf(SEPARATOR, first + 1);
  const third = second === -1 ? -1 : filename.indexOf(SEPARATOR, second + 1);
  if (third === -1) {
    return { ok: false, reason: 'InsufficientSeparators' };
  }

  if (third <= first + 1) {
    return { ok: false, reason: 'InvalidSeparatorSpacing' };
  }

  return { ok: true, code: filename.slice(first + 1, third) };
}
