import { describe, test, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import * as core from '@actions/core';
import { run } from '../src/action/run.js';

vi.mock('@actions/core', () => ({
  getInput: vi.fn(),
  setOutput: vi.fn(),
  setFailed: vi.fn(),
  info: vi.fn(),
}));

const __dirname = path.dirname(fileURLToPath(import.meta.url));

describe('GitHub Action', () => {
  let tempDir: string;

  beforeEach(() => {
    vi.clearAllMocks();
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'keypath-flatten-action-'));
  });

  afterEach(() => {
    vi.restoreAllMocks();
    if (tempDir && fs.existsSync(tempDir)) {
      fs.rmSync(tempDir, { recursive: true, force: true });
    }
  });

  function createInput(content: unknown): string {
    const inputFile = path.join(tempDir, 'input.json');
    fs.writeFileSync(inputFile, JSON.stringify(content), 'utf8');
    return inputFile;
  }

  function setInputs(inputs: Record<string, string>): void {
    vi.mocked(core.getInput).mockImplementation((name: string) => inputs[name] ?? '');
  }

  test('should set an output for every flattened key', () => {
    setInputs({ input: createInput({ a: { b: 'c' }, list: [1, 2] }) });

    run();

    expect(vi.mocked(core.setFailed)).not.toHaveBeenCalled();
    expect(vi.mocked(core.setOutput).mock.calls).toEqual([
      ['a.b', 'c'],
      ['list.0', 1],
      ['list.1', 2],
      ['json', '{"a.b":"c","list.0":1,"list.1":2}'],
    ]);
  });

  test('should log the settings in use', () => {
    const inputFile = createInput({ a: 1 });
    setInputs({ input: inputFile, style: 'path', depth: '2' });

    run();

    expect(vi.mocked(core.info)).toHaveBeenCalledWith(`Flattening '${inputFile}' with style path and depth 2`);
  });

  test('should log the resolved style when separators are overridden', () => {
    const inputFile = createInput({ a: 1 });
    setInputs({ input: inputFile, style: 'dot', middle: '::' });

    run();

    expect(vi.mocked(core.info)).toHaveBeenCalledWith(
      `Flattening '${inputFile}' with style custom {"before":"","middle":"::","after":""} and depth -1`
    );
  });

  test('should apply style, prefix, depth and array preservation', () => {
    setInputs({
      'input': createInput({ a: { b: { c: 'd' } }, tags: ['x', 'y'] }),
      'style': 'underscore',
      'prefix': 'TF_VAR_',
      'depth': '1',
      'preserve-arrays': 'true',
    });

    run();

    expect(vi.mocked(core.setOutput)).toHaveBeenCalledWith('TF_VAR_a_b', { c: 'd' });
    expect(vi.mocked(core.setOutput)).toHaveBeenCalledWith('TF_VAR_tags', ['x', 'y']);
  });

  test('should build a custom style from separator inputs', () => {
    setInputs({ input: createInput({ a: { b: 1 } }), style: 'rails', before: '(', after: ')' });

    run();

    expect(vi.mocked(core.setOutput)).toHaveBeenCalledWith('a(b)', 1);
  });

  test('should read JSON5 input', () => {
    setInputs({ input: path.join(__dirname, '..', 'test-input.json5'), json5: 'true' });

    run();

    expect(vi.mocked(core.setOutput)).toHaveBeenCalledWith('service.tls.enabled', true);
    expect(vi.mocked(core.setOutput)).toHaveBeenCalledWith('replicas', 3);
  });

  test('should display outputs when requested', () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    setInputs({ 'input': createInput({ a: { b: 'c' } }), 'display-outputs': 'true' });

    run();

    expect(logSpy.mock.calls).toEqual([
      ['=== Flattened Input ==='],
      ['{\n  "a.b": "c"\n}'],
      ['======================='],
    ]);
  });

  describe('failures', () => {
    test('should fail when the input is not an object', () => {
      setInputs({ input: createInput(['a']) });

      run();

      expect(vi.mocked(core.setFailed)).toHaveBeenCalledWith('not a valid input, must be a mapping');
      expect(vi.mocked(core.setOutput)).not.toHaveBeenCalled();
    });

    test('should fail for an unknown style', () => {
      setInputs({ input: createInput({ a: 1 }), style: 'colon' });

      run();

      expect(vi.mocked(core.setFailed)).toHaveBeenCalledWith(
        "Unknown separator style 'colon'. Available styles: dot, path, rails, underscore"
      );
    });

    test('should fail for a non-integer depth', () => {
      setInputs({ input: createInput({ a: 1 }), depth: 'deep' });

      run();

      expect(vi.mocked(core.setFailed)).toHaveBeenCalledWith("Depth must be an integer, got 'deep'");
    });
  });
});
