import { describe, it, expect } from 'vitest';
import {
  XmlParseError,
  escapeAttribute,
  escapeText,
  isValidAttributeName,
  parseDocument,
  serializeDocument,
} from './xml-codec.js';
import type { AggregateDocument } from './schema.js';

describe('serializeDocument', () => {
  it('should write an empty root as a self-closing element', () => {
    const xml = serializeDocument({ rootName: 'Root', entries: [] });

    expect(xml).toBe('<?xml version="1.0" encoding="utf-8"?>\n<Root />\n');
  });

  it('should put each entry on its own two-space indented line', () => {
    const doc: AggregateDocument = {
      rootName: 'Root',
      entries: [
        { attributes: { filename: 'a.pdf', processed_date: '2024-01-02T03:04:05.000Z' }, text: 'First' },
        { attributes: { filename: 'b.docx' }, text: 'Second' },
      ],
    };

    expect(serializeDocument(doc)).toBe(
      '<?xml version="1.0" encoding="utf-8"?>\n' +
        '<Root>\n' +
        '  <entry filename="a.pdf" processed_date="2024-01-02T03:04:05.000Z">First</entry>\n' +
        '  <entry filename="b.docx">Second</entry>\n' +
        '</Root>\n'
    );
  });

  it('should escape markup in text without touching its line breaks', () => {
    const doc: AggregateDocument = {
      rootName: 'Root',
      entries: [{ attributes: { filename: 'c.pdf' }, text: 'Terms & <conditions>\nline two' }],
    };

    expect(serializeDocument(doc)).toContain(
      '  <entry filename="c.pdf">Terms &amp; &lt;conditions&gt;\nline two</entry>\n'
    );
  });

  it('should write extracted text with form feeds and NULs as well-formed entries', () => {
    const doc: AggregateDocument = {
      rootName: 'Root',
      entries: [{ attributes: { filename: 'scan\u0000.pdf' }, text: 'page1\fpage2 \u0000 \u000b' }],
    };

    expect(serializeDocument(doc)).toBe(
      '<?xml version="1.0" encoding="utf-8"?>\n' +
        '<Root>\n' +
        '  <entry filename="scan.pdf">page1page2  </entry>\n' +
        '</Root>\n'
    );
  });

  it('should keep a loaded root element name', () => {
    const xml = serializeDocument({ rootName: 'Documents', entries: [{ attributes: {}, text: 'x' }] });

    expect(xml).toBe('<?xml version="1.0" encoding="utf-8"?>\n<Documents>\n  <entry>x</entry>\n</Documents>\n');
  });
});

describe('escaping', () => {
  it('should escape quotes and whitespace controls in attributes', () => {
    expect(escapeAttribute('say "hi" & go\tnow\n')).toBe('say &quot;hi&quot; &amp; go&#9;now&#10;');
  });

  it('should drop control characters XML does not allow', () => {
    expect(escapeText('page1\fpage2 \u0000 \u000b')).toBe('page1page2  ');
    expect(escapeAttribute('a\u0001b\u001fc')).toBe('abc');
  });

  it('should drop unpaired surrogates but keep valid pairs', () => {
    expect(escapeText('x\uD800y\uDC00z')).toBe('xyz');
    expect(escapeText('smile \uD83D\uDE00')).toBe('smile \uD83D\uDE00');
  });

  it('should leave quotes in text alone', () => {
    expect(escapeText('"quoted" <b>')).toBe('"quoted" &lt;b&gt;');
  });

  it('should accept only plain XML attribute names', () => {
    expect(isValidAttributeName('processed_date')).toBe(true);
    expect(isValidAttributeName('source.path')).toBe(true);
    expect(isValidAttributeName('1st')).toBe(false);
    expect(isValidAttributeName('has space')).toBe(false);
    expect(isValidAttributeName('')).toBe(false);
  });
});

describe('parseDocument', () => {
  it('should read entries with attributes in document order', () => {
    const xml =
      "<?xml version='1.0' encoding='utf-8'?>\n" +
      '<Root>\n' +
      '  <entry filename="old.docx" processed_date="2024-01-01 10:00:00.000000">Old text</entry>\n' +
      '  <entry filename="older.pdf">Older text</entry>\n' +
      '  </Root>';

    const doc = parseDocument(xml);

    expect(doc.rootName).toBe('Root');
    expect(doc.entries).toEqual([
      { attributes: { filename: 'old.docx', processed_date: '2024-01-01 10:00:00.000000' }, text: 'Old text' },
      { attributes: { filename: 'older.pdf' }, text: 'Older text' },
    ]);
  });

  it('should read a single entry as a list of one', () => {
    const doc = parseDocument('<Root><entry filename="only.pdf">Only</entry></Root>');

    expect(doc.entries).toEqual([{ attributes: { filename: 'only.pdf' }, text: 'Only' }]);
  });

  it('should read an empty root', () => {
    expect(parseDocument('<?xml version="1.0" encoding="utf-8"?>\n<Root />\n')).toEqual({
      rootName: 'Root',
      entries: [],
    });
  });

  it('should keep entries that have no filename', () => {
    const doc = parseDocument('<Root><entry source="manual">Hand written</entry></Root>');

    expect(doc.entries).toEqual([{ attributes: { source: 'manual' }, text: 'Hand written' }]);
  });

  it('should not coerce numeric-looking values', () => {
    const doc = parseDocument('<Root><entry filename="007.pdf" pages="12">0042</entry></Root>');

    expect(doc.entries[0]).toEqual({ attributes: { filename: '007.pdf', pages: '12' }, text: '0042' });
  });

  it('should reject text that is not XML', () => {
    expect(() => parseDocument('this is not xml')).toThrow(XmlParseError);
  });

  it('should reject an unclosed document', () => {
    expect(() => parseDocument('<Root><entry filename="a.pdf">text</Root>')).toThrow(XmlParseError);
  });

  it('should reject an empty file', () => {
    expect(() => parseDocument('')).toThrow(XmlParseError);
  });

  it('should restore text and attributes written by serializeDocument', () => {
    const doc: AggregateDocument = {
      rootName: 'Root',
      entries: [
        {
          attributes: { filename: 'Q&A "final".pdf', processed_date: '2024-05-06T07:08:09.000Z' },
          text: 'Line one\nLine <two> & three\n\n  indented line\n',
        },
        { attributes: { filename: 'plain.docx' }, text: 'Plain' },
      ],
    };

    expect(parseDocument(serializeDocument(doc))).toEqual(doc);
  });
});
