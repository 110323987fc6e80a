import { describe, it, expect } from 'vitest';
import { cleanDomain, joinDomain } from '../src/domain.js';

describe('cleanDomain', () => {
  it('returns bare domain as-is', () => {
    expect(cleanDomain('example.com')).toBe('example.com');
  });

  it('extracts domain from HTTPS URL', () => {
    expect(cleanDomain('https://example.com/path?q=1')).toBe('example.com');
  });

  it('lowercases domain', () => {
    expect(cleanDomain('EXAMPLE.COM')).toBe('example.com');
  });

  it('removes trailing dot (FQDN)', () => {
    expect(cleanDomain('example.com.')).toBe('example.com');
  });

  it('trims whitespace', () => {
    expect(cleanDomain('  example.com  ')).toBe('example.com');
  });

  it('keeps subdomains', () => {
    expect(cleanDomain('www.example.co.uk')).toBe('www.example.co.uk');
  });

  it('handles input with path but no protocol', () => {
    expect(cleanDomain('example.com/page')).toBe('example.com');
  });
});

describe('joinDomain', () => {
  it('returns the domain for an empty subdomain', () => {
    expect(joinDomain('', 'example.com')).toBe('example.com');
  });

  it('prefixes the subdomain', () => {
    expect(joinDomain('www', 'example.com')).toBe('www.example.com');
  });

  it('keeps multi-label subdomains', () => {
    expect(joinDomain('vpn.home', 'example.com')).toBe('vpn.home.example.com');
  });
});
