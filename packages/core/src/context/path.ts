/**
 * Field paths and their textual renderings.
 *
 * A path is an ordered list of segments: string segments name a field,
 * numeric segments index into a list. The default rendering is the
 * slash-delimited form used as the canonical `ValidationError.path`.
 */

export type PathSegment = string | number;

export type PathSerializer = (segments: readonly PathSegment[]) => string;

/** `/users/0/name`; the root path is the empty string. */
export const defaultPath: PathSerializer = (segments) =>
  segments.map((segment) => `/${String(segment)}`).join('');

/** RFC 6901 JSON Pointer. */
export const jsonPointer: PathSerializer = (segments) => {
  if (segments.length === 0) return '';
  return (
    '/' +
    segments
      .map((segment) =>
        typeof segment === 'number'
          ? String(segment)
          : segment.replace(/~/g, '~0').replace(/\//g, '~1')
      )
      .join('/')
  );
};

function bracketIfNeeded(segment: string): string {
  if (/[.[\]]/.test(segment)) {
    return `['${segment.replace(/'/g, "\\'")}']`;
  }
  return segment;
}

/** `users[0].name`, with `['a.b']` for names containing `.`, `[` or `]`. */
export const dotNotation: PathSerializer = (segments) => {
  let out = '';
  segments.forEach((segment, i) => {
    if (typeof segment === 'number') {
      out += `[${segment}]`;
      return;
    }
    const rendered = bracketIfNeeded(segment);
    if (i > 0 && !rendered.startsWith('[')) out += '.';
    out += rendered;
  });
  return out;
};

/** `$.users[0].name`; the root path is `$`. */
export const jsonPath: PathSerializer = (segments) => {
  let out = '$';
  for (const segment of segments) {
    if (typeof segment === 'number') {
      out += `[${segment}]`;
      continue;
    }
    const rendered = bracketIfNeeded(segment);
    out += rendered.startsWith('[') ? rendered : `.${rendered}`;
  }
  return out;
};

export const PATH_SERIALIZERS = {
  default: defaultPath,
  jsonPointer,
  dotNotation,
  jsonPath,
} as const satisfies Record<string, PathSerializer>;

export type PathFormat = keyof typeof PATH_SERIALIZERS;
