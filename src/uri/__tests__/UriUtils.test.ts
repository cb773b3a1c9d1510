import { describe, it, expect } from '@jest/globals';
import {
  InvalidUriError,
  createUriAsEntryOrFeedId,
  ensureEscapedFragment,
  ensureTrailingSlash,
  uriToAbsoluteUri,
  uriToString,
} from '../UriUtils.js';

const BASE = new URL('http://localhost/svc/');

describe('UriUtils', () => {
  describe('uriToAbsoluteUri', () => {
    it('should resolve a relative reference against the base', () => {
      expect(uriToAbsoluteUri(BASE, 'Customers(1)').href).toBe('http://localhost/svc/Customers(1)');
    });

    it('should reject an absolute reference', () => {
      expect(() => uriToAbsoluteUri(BASE, 'http://other/')).toThrow(InvalidUriError);
    });
  });

  describe('createUriAsEntryOrFeedId', () => {
    it('should return null for missing and empty values', () => {
      expect(createUriAsEntryOrFeedId(null)).toBeNull();
      expect(createUriAsEntryOrFeedId(undefined)).toBeNull();
      expect(createUriAsEntryOrFeedId('')).toBeNull();
    });

    it('should parse absolute ids', () => {
      expect(createUriAsEntryOrFeedId('urn:id:42')?.href).toBe('urn:id:42');
    });

    it('should resolve relative ids when a base is given', () => {
      expect(createUriAsEntryOrFeedId('Customers(1)', BASE)?.href).toBe(
        'http://localhost/svc/Customers(1)'
      );
    });

    it('should reject values that are not URIs', () => {
      expect(() => createUriAsEntryOrFeedId('not a uri')).toThrow(
        "The value 'not a uri' is not a valid URI for an entry or feed id"
      );
    });

    it('should reject empty values when they are not swallowed', () => {
      expect(() => createUriAsEntryOrFeedId('', BASE, false)).toThrow(InvalidUriError);
    });
  });

  describe('ensureEscapedFragment', () => {
    it('should escape everything after the fragment marker', () => {
      expect(ensureEscapedFragment('#Customers/$entity x')).toBe('#Customers%2F%24entity%20x');
    });

    it('should require a leading #', () => {
      expect(() => ensureEscapedFragment('Customers')).toThrow(InvalidUriError);
    });
  });

  describe('uriToString', () => {
    it('should return href for URLs and relative strings unchanged', () => {
      expect(uriToString(new URL('http://localhost/a b'))).toBe('http://localhost/a%20b');
      expect(uriToString('a b')).toBe('a b');
    });
  });

  describe('ensureTrailingSlash', () => {
    it('should append a slash only when missing', () => {
      expect(ensureTrailingSlash('svc')).toBe('svc/');
      expect(ensureTrailingSlash('svc/')).toBe('svc/');
      expect(ensureTrailingSlash(new URL('http://localhost/svc')).href).toBe('http://localhost/svc/');
      expect(ensureTrailingSlash(BASE)).toBe(BASE);
    });
  });
});
