import { describe, it, expect } from 'vitest';
import { childElements, findFirstElement, firstText, parseDocument, textValues } from '../src/xml.js';
import { CatalogParseError } from '../src/errors.js';

const DOC_URL = 'http://catalog.test/doc';

describe('parseDocument', () => {
  it('builds an ordered tree without the declaration', () => {
    const doc = parseDocument('<?xml version="1.0"?><a><b>one</b><c/><b>two</b></a>', DOC_URL);

    expect(doc).toEqual([
      {
        kind: 'element',
        name: 'a',
        children: [
          { kind: 'element', name: 'b', children: [{ kind: 'text', value: 'one' }] },
          { kind: 'element', name: 'c', children: [] },
          { kind: 'element', name: 'b', children: [{ kind: 'text', value: 'two' }] }
        ]
      }
    ]);
  });

  it('ignores attributes', () => {
    const doc = parseDocument('<locations count="1"><location type="disk">/x</location></locations>', DOC_URL);
    const locations = findFirstElement(doc, 'locations');

    expect(locations && childElements(locations, 'location').map(firstText)).toEqual(['/x']);
  });

  it('decodes decimal character references', () => {
    const proposal = findFirstElement(parseDocument('<r><proposal>IPTS&#45;12</proposal></r>', DOC_URL), 'proposal');

    expect(proposal && firstText(proposal)).toBe('IPTS-12');
  });

  it('decodes hex character references', () => {
    const location = findFirstElement(parseDocument('<r><location>/SNS/caf&#xE9;/f</location></r>', DOC_URL), 'location');

    expect(location && firstText(location)).toBe('/SNS/caf\u00e9/f');
  });

  it('throws CatalogParseError for mismatched tags', () => {
    expect(() => parseDocument('<a><b></a>', DOC_URL)).toThrow(CatalogParseError);
  });
});

describe('findFirstElement', () => {
  it('finds the first match in document order at any depth', () => {
    const doc = parseDocument('<r><x><proposal>P1</proposal></x><proposal>P2</proposal></r>', DOC_URL);
    const proposal = findFirstElement(doc, 'proposal');

    expect(proposal && textValues(proposal)).toEqual(['P1']);
  });

  it('returns undefined when nothing matches', () => {
    expect(findFirstElement(parseDocument('<r/>', DOC_URL), 'proposal')).toBeUndefined();
  });
});
