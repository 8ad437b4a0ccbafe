import { describe, expect, it } from 'vitest';
import { extractJSON, isRecord, parseJSONValue, stripCodeFences, stripEmphasis } from '../responseParsing';

describe('stripCodeFences', () => {
  it('unwraps a fenced reply', () => {
    expect(stripCodeFences('```markdown\n# Title\nBody\n```')).toBe('# Title\nBody');
  });

  it('leaves fences inside the text alone', () => {
    const text = 'Intro\n```js\nx()\n```\nOutro';
    expect(stripCodeFences(text)).toBe(text);
  });

  it('trims surrounding whitespace', () => {
    expect(stripCodeFences('  plain text \n')).toBe('plain text');
  });
});

describe('stripEmphasis', () => {
  it('removes bold markers', () => {
    expect(stripEmphasis('**B) Newton**')).toBe('B) Newton');
  });
});

describe('extractJSON', () => {
  it('extracts from a json code block', () => {
    expect(extractJSON('Here:\n```json\n[{"a": 1}]\n```\nDone')).toBe('[{"a": 1}]');
  });

  it('extracts a bare object surrounded by text', () => {
    expect(extractJSON('Result: {"questions": []} end')).toBe('{"questions": []}');
  });

  it('ignores brackets inside strings', () => {
    expect(extractJSON('[{"q": "What is ] here?"}] trailing')).toBe('[{"q": "What is ] here?"}]');
  });

  it('returns null when there is no JSON', () => {
    expect(extractJSON('No structure at all')).toBeNull();
  });

  it('returns null for an unterminated value', () => {
    expect(extractJSON('[{"a": 1}')).toBeNull();
  });
});

describe('parseJSONValue', () => {
  it('parses valid JSON', () => {
    expect(parseJSONValue('```json\n{"ok": true}\n```')).toEqual({ ok: true });
  });

  it('returns null for invalid JSON', () => {
    expect(parseJSONValue("{'single': 'quotes'}")).toBeNull();
  });
});

describe('isRecord', () => {
  it('accepts plain objects only', () => {
    expect(isRecord({})).toBe(true);
    expect(isRecord([])).toBe(false);
    expect(isRecord(null)).toBe(false);
    expect(isRecord('text')).toBe(false);
  });
});
