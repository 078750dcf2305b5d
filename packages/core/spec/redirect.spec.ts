import { describe, expect, it } from 'vitest';

import { InvalidRedirectError } from '#errors';
import {
  buildClientRedirect,
  compileRedirectPattern,
  matchesRedirectPattern,
  validateDeclaredRedirectUri,
  validateRedirectUri,
} from '#redirect';

describe('fn:compileRedirectPattern', () => {
  it('should parse a wildcard host with a path prefix', () => {
    expect(compileRedirectPattern('https://*.example.com/app/*')).toEqual({
      source: 'https://*.example.com/app/*',
      protocol: 'https:',
      host: '.example.com',
      wildcardHost: true,
      port: '',
      path: '/app/',
      pathPrefix: true,
    });
  });

  it('should parse a wildcard port without a path', () => {
    expect(compileRedirectPattern('http://localhost:*')).toEqual({
      source: 'http://localhost:*',
      protocol: 'http:',
      host: 'localhost',
      wildcardHost: false,
      port: null,
      path: null,
      pathPrefix: false,
    });
  });

  it('should reject a bare wildcard', () => {
    expect(() => compileRedirectPattern('*')).toThrow(
      'invalid redirect pattern: *',
    );
  });

  it('should reject a wildcard scheme', () => {
    expect(() => compileRedirectPattern('*://example.com/cb')).toThrow(
      'invalid redirect pattern',
    );
  });

  it('should reject a wildcard over a single label', () => {
    expect(() => compileRedirectPattern('https://*.com/*')).toThrow(
      'redirect pattern wildcard is too broad: https://*.com/*',
    );
  });

  it('should reject a wildcard inside the host', () => {
    expect(() => compileRedirectPattern('https://app.*.example.com')).toThrow(
      'redirect pattern may only wildcard the leftmost host label',
    );
  });

  it('should reject a wildcard in the middle of the path', () => {
    expect(() => compileRedirectPattern('https://example.com/*/cb')).toThrow(
      'redirect pattern may only wildcard a trailing path segment',
    );
  });
});

describe('fn:matchesRedirectPattern', () => {
  it('should match a subdomain under a wildcard host', () => {
    expect(
      matchesRedirectPattern(
        'https://app.example.com/callback',
        'https://*.example.com/*',
      ),
    ).toBe(true);
  });

  it('should match nested subdomains under a wildcard host', () => {
    expect(
      matchesRedirectPattern(
        'https://a.b.example.com/callback',
        'https://*.example.com/*',
      ),
    ).toBe(true);
  });

  it('should not match a lookalike suffix', () => {
    expect(
      matchesRedirectPattern(
        'https://example.com.evil.net/callback',
        'https://*.example.com/*',
      ),
    ).toBe(false);
  });

  it('should not match the bare parent domain', () => {
    expect(
      matchesRedirectPattern(
        'https://example.com/callback',
        'https://*.example.com/*',
      ),
    ).toBe(false);
  });

  it('should match any port on a loopback wildcard', () => {
    expect(
      matchesRedirectPattern('http://localhost:9000/cb', 'http://localhost:*'),
    ).toBe(true);
    expect(
      matchesRedirectPattern('http://127.0.0.1:51234/cb', 'http://127.0.0.1:*'),
    ).toBe(true);
  });

  it('should require the exact port when one is given', () => {
    expect(
      matchesRedirectPattern('http://localhost:9001/cb', 'http://localhost:9000'),
    ).toBe(false);
  });

  it('should only match the default port when the pattern names none', () => {
    expect(
      matchesRedirectPattern(
        'https://app.example.com:8443/cb',
        'https://app.example.com/cb',
      ),
    ).toBe(false);
    expect(
      matchesRedirectPattern(
        'https://app.example.com:443/cb',
        'https://app.example.com/cb',
      ),
    ).toBe(true);
  });

  it('should treat an explicit default port like no port', () => {
    expect(
      matchesRedirectPattern(
        'https://app.example.com/cb',
        'https://app.example.com:443/cb',
      ),
    ).toBe(true);
  });

  it('should not cross schemes', () => {
    expect(
      matchesRedirectPattern('http://app.example.com/cb', 'https://*.example.com'),
    ).toBe(false);
  });

  it('should match an exact path only exactly', () => {
    expect(
      matchesRedirectPattern('https://example.com/cb', 'https://example.com/cb'),
    ).toBe(true);
    expect(
      matchesRedirectPattern(
        'https://example.com/cb/extra',
        'https://example.com/cb',
      ),
    ).toBe(false);
  });

  it('should match a path prefix', () => {
    expect(
      matchesRedirectPattern(
        'https://example.com/app/deep/cb',
        'https://example.com/app/*',
      ),
    ).toBe(true);
    expect(
      matchesRedirectPattern('https://example.com/other', 'https://example.com/app/*'),
    ).toBe(false);
  });

  it('should never match a uri carrying userinfo', () => {
    expect(
      matchesRedirectPattern(
        'https://user@app.example.com/cb',
        'https://*.example.com/*',
      ),
    ).toBe(false);
  });

  it('should never match a uri carrying a fragment', () => {
    expect(
      matchesRedirectPattern(
        'https://app.example.com/cb#frag',
        'https://*.example.com/*',
      ),
    ).toBe(false);
  });

  it('should treat a malformed pattern as no match', () => {
    expect(matchesRedirectPattern('https://example.com/cb', '*')).toBe(false);
  });
});

describe('fn:validateRedirectUri', () => {
  const declared = ['http://localhost:9000/cb'];

  it('should accept a declared uri', () => {
    expect(() =>
      validateRedirectUri('http://localhost:9000/cb', declared),
    ).not.toThrow();
  });

  it('should reject an undeclared uri', () => {
    expect(() => validateRedirectUri('http://evil.example/', declared)).toThrow(
      InvalidRedirectError,
    );
  });

  it('should compare byte for byte', () => {
    expect(() =>
      validateRedirectUri('http://localhost:9000/cb/', declared),
    ).toThrow('redirect_uri not registered for this client');
  });

  it('should reject a declared uri outside the allowlist', () => {
    expect(() =>
      validateRedirectUri('http://localhost:9000/cb', declared, [
        'https://*.example.com/*',
      ]),
    ).toThrow('redirect_uri is not permitted by the redirect allowlist');
  });

  it('should reject a declared uri on a port the allowlist does not name', () => {
    expect(() =>
      validateRedirectUri(
        'https://app.example.com:8443/cb',
        ['https://app.example.com:8443/cb'],
        ['https://app.example.com/cb'],
      ),
    ).toThrow('redirect_uri is not permitted by the redirect allowlist');
  });

  it('should accept a declared uri inside the allowlist', () => {
    expect(() =>
      validateRedirectUri('http://localhost:9000/cb', declared, [
        'http://localhost:*',
      ]),
    ).not.toThrow();
  });
});

describe('fn:validateDeclaredRedirectUri', () => {
  it('should accept https', () => {
    expect(() =>
      validateDeclaredRedirectUri('https://app.example.com/cb'),
    ).not.toThrow();
  });

  it('should accept http on loopback hosts', () => {
    expect(() =>
      validateDeclaredRedirectUri('http://127.0.0.1:8080/cb'),
    ).not.toThrow();
    expect(() => validateDeclaredRedirectUri('http://[::1]:8080/cb')).not.toThrow();
  });

  it('should reject http on other hosts', () => {
    try {
      validateDeclaredRedirectUri('http://app.example.com/cb');
      expect.fail('expected validation to throw');
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidRedirectError);
      expect(error).toMatchObject({
        code: 'invalid_redirect_uri',
        message: 'redirect_uri must use https: http://app.example.com/cb',
      });
    }
  });

  it('should reject fragments', () => {
    expect(() =>
      validateDeclaredRedirectUri('https://app.example.com/cb#x'),
    ).toThrow('redirect_uri must not contain a fragment');
  });

  it('should reject unparsable uris', () => {
    expect(() => validateDeclaredRedirectUri('not a uri')).toThrow(
      'invalid redirect_uri format: not a uri',
    );
  });
});

describe('fn:buildClientRedirect', () => {
  it('should append parameters and skip undefined ones', () => {
    const url = new URL(
      buildClientRedirect('https://app.example.com/cb?keep=1', {
        code: 'abc',
        state: undefined,
      }),
    );

    expect(url.searchParams.get('keep')).toBe('1');
    expect(url.searchParams.get('code')).toBe('abc');
    expect(url.searchParams.has('state')).toBe(false);
  });
});
