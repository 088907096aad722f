import { describe, expect, it } from 'vitest';

import { defaultPath, dotNotation, jsonPath, jsonPointer } from '../path.js';

describe('path serializers', () => {
  it('render the root path', () => {
    expect(defaultPath([])).toBe('');
    expect(jsonPointer([])).toBe('');
    expect(dotNotation([])).toBe('');
    expect(jsonPath([])).toBe('$');
  });

  it('default joins segments with slashes', () => {
    expect(defaultPath(['users', 0, 'name'])).toBe('/users/0/name');
  });

  it('json pointer escapes ~ and / per RFC 6901', () => {
    expect(jsonPointer(['a/b', 'm~n', 2])).toBe('/a~1b/m~0n/2');
  });

  it('dot notation brackets indices and special names', () => {
    expect(dotNotation(['users', 0, 'name'])).toBe('users[0].name');
    expect(dotNotation([0, 'x'])).toBe('[0].x');
    expect(dotNotation(['a.b', "it's[1]"])).toBe("['a.b']['it\\'s[1]']");
  });

  it('json path prefixes with $', () => {
    expect(jsonPath(['users', 0, 'name'])).toBe('$.users[0].name');
    expect(jsonPath(['a.b'])).toBe("$['a.b']");
  });
});
