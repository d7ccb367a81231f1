import { basename, join, posix, sep } from 'path';
import { InvalidDataDepError, ValidationError } from './errors.js';

const URL_SCHEME_PATTERN = /^[a-z][a-z0-9+.-]*:\/\//i;

export interface NamePath {
  name: string;
  /** Path inside the dependency directory; '' means the directory itself */
  innerPath: string;
}

/**
 * Split "Name/inner/file" into the dependency name and the inner path.
 */
export function splitNamePath(namePath: string): NamePath {
  const separators = sep === '/' ? /\/+/ : /[\\/]+/;
  const parts = namePath.split(separators).filter(part => part.length > 0);

  if (parts.length === 0) {
    throw new ValidationError(`'${namePath}' does not name a data dependency`);
  }

  const [name, ...rest] = parts;
  return {
    name,
    innerPath: rest.length > 0 ? join(...rest) : ''
  };
}

function decodeSegment(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    // A stray '%' is legal in a URL path; keep the segment as written
    return segment;
  }
}

/**
 * File name a locator is saved under: the last path segment of a URL
 * (query and fragment ignored), or the basename of anything else.
 * Names that would leave the download directory are rejected.
 */
export function filenameFromLocator(locator: string): string {
  let filename: string;

  if (URL_SCHEME_PATTERN.test(locator)) {
    let url: URL;
    try {
      url = new URL(locator);
    } catch (error) {
      throw new InvalidDataDepError(`'${locator}' is not a valid URL`, { locator, error });
    }
    filename = decodeSegment(posix.basename(url.pathname));
  } else {
    filename = basename(locator);
  }

  if (!filename || filename === '.' || filename === '..' || /[\\/]/.test(filename)) {
    throw new InvalidDataDepError(`cannot derive a file name from '${locator}'`, { locator, filename });
  }
  return filename;
}

/**
 * True for locators that carry a URL scheme
 */
export function isUrlLocator(locator: string): boolean {
  return URL_SCHEME_PATTERN.test(locator);
}
