import * as core from '@actions/core';
import fs from 'node:fs';
import { flatten, flattenPreservingSequences } from '../flatten.js';
import { parseNested } from '../lib/flatten-string.js';
import { buildStyle, describeStyle } from '../lib/separator-style.js';
import { parseDepth } from '../lib/utils.js';

/**
 * Flatten the `input` file and expose every key as a step output. The whole
 * flat map is also set as the `json` output, after the per-key outputs.
 */
export function run(): void {
  try {
    const inputFile = core.getInput('input', { required: true });
    const prefix = core.getInput('prefix');
    const styleName = core.getInput('style') || 'dot';
    const depthInput = core.getInput('depth');
    const preserveArrays = core.getInput('preserve-arrays') === 'true';
    const useJson5 = core.getInput('json5') === 'true';
    const displayOutputs = core.getInput('display-outputs') === 'true';

    const style = buildStyle(styleName, {
      before: core.getInput('before') || undefined,
      middle: core.getInput('middle') || undefined,
      after: core.getInput('after') || undefined,
    });
    const depth = depthInput ? parseDepth(depthInput) : -1;

    core.info(`Flattening '${inputFile}' with style ${describeStyle(style)} and depth ${depth}`);

    const nested = parseNested(fs.readFileSync(inputFile, 'utf8'), useJson5 ? 'json5' : 'json');
    const flat = preserveArrays
      ? flattenPreservingSequences(nested, prefix, style, depth)
      : flatten(nested, prefix, style, depth);

    if (displayOutputs) {
      console.log('=== Flattened Input ===');
      console.log(JSON.stringify(flat, null, 2));
      console.log('=======================');
    }

    for (const [k, v] of Object.entries(flat)) {
      core.setOutput(k, v);
    }
    core.setOutput('json', JSON.stringify(flat));
  } catch (error) {
    core.setFailed(error instanceof Error ? error.message : String(error));
  }
}
