import { describe, it, expect } from 'vitest';
import {
  PageReference,
  sanitizeFileName,
} from '../../../src/domain/value-objects/page-reference.vo';
import { MalformedURLError } from '../../../src/domain/errors/export.errors';
import { captureError } from '../helpers/mock-factories';

describe('PageReference', () => {
  describe('parse', () => {
    it('should read site, space, page id and title from a cloud page URL', () => {
      const page = PageReference.parse(
        'https://example.atlassian.net/wiki/spaces/DOCS/pages/123456/Release+Notes',
      );

      expect(page.siteBaseUrl).toBe('https://example.atlassian.net');
      expect(page.spaceKey).toBe('DOCS');
      expect(page.pageId).toBe('123456');
      expect(page.titleSlug).toBe('Release+Notes');
      expect(page.suggestedFileName()).toBe('Release_Notes.pdf');
    });

    it('should accept a page URL without a title segment', () => {
      const page = PageReference.parse('https://wiki.example.com/wiki/spaces/OPS/pages/42');

      expect(page.pageId).toBe('42');
      expect(page.titleSlug).toBeUndefined();
      expect(page.suggestedFileName()).toBe('42.pdf');
    });

    it('should accept the viewpage.action form', () => {
      const page = PageReference.parse(
        'https://wiki.example.com/pages/viewpage.action?pageId=98765',
      );

      expect(page.pageId).toBe('98765');
      expect(page.spaceKey).toBeUndefined();
      expect(page.suggestedFileName()).toBe('98765.pdf');
    });

    it('should trim surrounding whitespace', () => {
      const page = PageReference.parse('  https://wiki.example.com/pages/7/Intro  ');

      expect(page.url).toBe('https://wiki.example.com/pages/7/Intro');
      expect(page.toString()).toBe('https://wiki.example.com/pages/7/Intro');
      expect(page.pageId).toBe('7');
    });

    it.each([
      ['not a url'],
      [''],
      ['ftp://wiki.example.com/pages/1/Title'],
      ['https://wiki.example.com/wiki/spaces/DOCS/overview'],
      ['https://wiki.example.com/wiki/spaces/DOCS/pages/abc/Title'],
      ['https://wiki.example.com/wiki/spaces/DOCS/pages/123abc'],
      ['https://wiki.example.com/pages/viewpage.action?pageId=x1'],
      ['https://wiki.example.com/pages/viewpage.action'],
    ])('should reject %j as a malformed URL', (url) => {
      expect(() => PageReference.parse(url)).toThrow(MalformedURLError);
    });

    it('should report the offending URL in the error', async () => {
      const error = await captureError(() =>
        PageReference.parse('https://wiki.example.com/display/DOCS/Home'),
      );

      expect(error).toBeInstanceOf(MalformedURLError);
      expect(error).toMatchObject({
        url: 'https://wiki.example.com/display/DOCS/Home',
        message:
          'Malformed page URL "https://wiki.example.com/display/DOCS/Home": path has no /pages/<id> segment',
      });
    });

    it('should always yield a numeric page id', () => {
      const urls = [
        'https://example.atlassian.net/wiki/spaces/DOCS/pages/1/A',
        'https://example.atlassian.net/wiki/spaces/DOCS/pages/2009/B/edit',
        'http://wiki.example.com/pages/viewpage.action?pageId=31&focused=true',
        'https://wiki.example.com/pages/404',
      ];

      for (const url of urls) {
        expect(PageReference.parse(url).pageId).toMatch(/^\d+$/);
      }
    });
  });

  describe('immutability', () => {
    it('should be frozen', () => {
      const page = PageReference.parse('https://wiki.example.com/pages/7/Intro');

      expect(Object.isFrozen(page)).toBe(true);
    });

    it('should serialize its parts', () => {
      const page = PageReference.parse('https://wiki.example.com/wiki/spaces/OPS/pages/7/Intro');

      expect(JSON.parse(JSON.stringify(page))).toEqual({
        url: 'https://wiki.example.com/wiki/spaces/OPS/pages/7/Intro',
        siteBaseUrl: 'https://wiki.example.com',
        pageId: '7',
        spaceKey: 'OPS',
        titleSlug: 'Intro',
      });
    });
  });

  describe('suggestedFileName', () => {
    it('should decode percent-encoded titles', () => {
      const page = PageReference.parse('https://wiki.example.com/pages/8/Caf%C3%A9+Menu');

      expect(page.suggestedFileName()).toBe('Café_Menu.pdf');
    });

    it('should fall back to the page id when the title has no usable characters', () => {
      const page = PageReference.parse('https://wiki.example.com/pages/9/%2B%2B');

      expect(page.suggestedFileName()).toBe('9.pdf');
    });
  });

  describe('sanitizeFileName', () => {
    it('should replace separators and punctuation with underscores', () => {
      expect(sanitizeFileName('Q3 report: draft/v2')).toBe('Q3_report__draft_v2');
    });

    it('should keep hyphens and underscores', () => {
      expect(sanitizeFileName('on-call_runbook')).toBe('on-call_runbook');
    });

    it('should use the raw segment when it cannot be decoded', () => {
      expect(sanitizeFileName('100%')).toBe('100_');
    });
  });
});
