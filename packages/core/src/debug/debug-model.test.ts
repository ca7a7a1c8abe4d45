import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, describe, expect, it } from 'vitest';
import { DebugModel, validateDebugModel } from './debug-model.ts';

const sample = {
  ops: [
    { byte: 0, original_line: '  CPY ACC 5', line_num: 4, processed_line: 'CPY ACC 5' },
    { byte: 3, original_line: 'PRTC ACC', line_num: 6, processed_line: 'PRTC ACC' },
  ],
  strings: [{ addr: 10, key: 'greeting', original_line: 'greeting="hi"', line_num: 2, usage: [3] }],
  labels: [{ byte: 3, name: 'loop', original_line: 'loop:', line_num: 5, usage: [] }],
};

describe('validateDebugModel', () => {
  it('fills in missing sections', () => {
    const data = validateDebugModel(sample);
    expect(data.data).toEqual([]);
    expect(data.strings[0]?.key).toBe('greeting');
  });

  it('defaults usage to an empty list', () => {
    const data = validateDebugModel({
      labels: [{ byte: 1, name: 'start', original_line: 'start:', line_num: 1 }],
    });
    expect(data.labels[0]?.usage).toEqual([]);
  });

  it('names the offending field', () => {
    expect(() => validateDebugModel([])).toThrow('debug model must be an object');
    expect(() => validateDebugModel({ ops: {} })).toThrow('"ops" must be an array');
    expect(() =>
      validateDebugModel({ ops: [{ byte: -1, original_line: '', line_num: 1, processed_line: '' }] }),
    ).toThrow('ops[0].byte must be a non-negative integer');
    expect(() =>
      validateDebugModel({ labels: [{ byte: 1, name: 7, original_line: '', line_num: 1 }] }),
    ).toThrow('labels[0].name must be a string');
  });
});

describe('DebugModel', () => {
  const model = new DebugModel(validateDebugModel(sample));

  it('looks up ops and labels by address', () => {
    expect(model.opAt(0)?.processed_line).toBe('CPY ACC 5');
    expect(model.opAt(1)).toBeUndefined();
    expect(model.labelAt(3)?.name).toBe('loop');
    expect(model.labelAddress('loop')).toBe(3);
    expect(model.labelAddress('missing')).toBeUndefined();
  });

  it('describes an address by label and source line', () => {
    expect(model.describe(3)).toBe('loop (line 6): PRTC ACC');
    expect(model.describe(0)).toBe('(line 4): CPY ACC 5');
    expect(model.describe(99)).toBeUndefined();
  });

  describe('load', () => {
    let dir: string | undefined;

    afterEach(() => {
      if (dir) rmSync(dir, { recursive: true, force: true });
      dir = undefined;
    });

    it('reads a model from disk', () => {
      dir = mkdtempSync(join(tmpdir(), 'steplink-model-'));
      const path = join(dir, 'prog.debug.json');
      writeFileSync(path, JSON.stringify(sample));
      expect(DebugModel.load(path).labelAddress('loop')).toBe(3);
    });

    it('prefixes validation errors with the file path', () => {
      dir = mkdtempSync(join(tmpdir(), 'steplink-model-'));
      const path = join(dir, 'bad.json');
      writeFileSync(path, JSON.stringify({ ops: 1 }));
      expect(() => DebugModel.load(path)).toThrow(`${path}: "ops" must be an array`);
    });
  });
});
