import { describe, it, expect } from 'vitest';
import { buildSummary, decodeEntities, stripMarkup, truncate } from '../text';

describe('Text utils', () => {
  it('stripMarkup removes tags and turns <br> into newlines', () => {
    expect(stripMarkup('<p>Line one<br/>Line <b>two</b></p>')).toBe('Line one\nLine two');
  });

  it('stripMarkup decodes entities after removing tags', () => {
    expect(stripMarkup('<p>Fish &amp; Chips &lt;3</p>')).toBe('Fish & Chips <3');
  });

  it('decodeEntities handles numeric references', () => {
    expect(decodeEntities('&#65;&#x42;&#39;')).toBe("AB'");
  });

  it('decodeEntities drops out-of-range references', () => {
    expect(decodeEntities('a&#99999999;b')).toBe('ab');
  });

  it('truncate leaves short text untouched', () => {
    expect(truncate('short', 10)).toBe('short');
  });

  it('truncate cuts at the limit and appends the marker', () => {
    expect(truncate('abcdefghij', 4)).toBe('abcd...');
  });

  it('buildSummary caps at 500 characters plus marker', () => {
    const summary = buildSummary(`<div>${'x'.repeat(600)}</div>`);
    expect(summary).toBe('x'.repeat(500) + '...');
  });
});
