import fs from 'node:fs';
import path from 'node:path';
import { Command, InvalidArgumentError, Option } from 'commander';
import { flatten, flattenPreservingSequences } from './flatten.js';
import { parseNested } from './lib/flatten-string.js';
import { buildStyle, composeKey, SeparatorStyles } from './lib/separator-style.js';
import { parseDepth } from './lib/utils.js';
import type { FlatMap, SeparatorStyle, SeparatorStyleName } from './types/index.js';

interface FlattenCommandOptions {
  prefix: string;
  style: SeparatorStyleName;
  before?: string;
  middle?: string;
  after?: string;
  depth: number;
  preserveArrays: boolean;
  json5: boolean;
  minify: boolean;
  debug: boolean;
}

function depthArgument(value: string): number {
  try {
    return parseDepth(value);
  } catch (error) {
    throw new InvalidArgumentError(error instanceof Error ? error.message : String(error));
  }
}

function exampleKey(style: SeparatorStyle, segments: string[]): string {
  return segments.reduce((key, segment, i) => composeKey(i === 0, key, segment, style), '');
}

export function createProgram(): Command {
  const program: Command = new Command();

  program
    .name('keypath-flatten')
    .description('Flatten nested JSON into single-level keys')
    .version('1.0.0');

  // Flatten command - read a JSON (or JSON5) object and print its flattened form
  program
    .command('flatten')
    .description('Flatten a JSON object file into path-encoded keys')
    .argument('<input>', 'Input JSON file path')
    .argument('[output]', 'Output JSON file path (optional, defaults to stdout)')
    .option('--prefix <prefix>', 'Text prepended to every key', '')
    .addOption(
      new Option('--style <style>', 'Separator style')
        .choices(Object.keys(SeparatorStyles))
        .default('dot')
    )
    .option('--before <text>', 'Custom text placed before each nested key')
    .option('--middle <text>', 'Custom text placed between keys')
    .option('--after <text>', 'Custom text placed after each nested key')
    .option('--depth <n>', 'Levels to collapse into keys (negative for no limit)', depthArgument, -1)
    .option('--preserve-arrays', 'Keep arrays intact instead of flattening by index', false)
    .option('--json5', 'Parse the input as JSON5', false)
    .option('--minify', 'Minify the JSON output', false)
    .option('--debug', 'Enable debug mode', false)
    .action((input: string, output: string | undefined, options: FlattenCommandOptions) => {
      let flat: FlatMap;
      try {
        const style = buildStyle(options.style, {
          before: options.before,
          middle: options.middle,
          after: options.after,
        });
        const text = fs.readFileSync(path.resolve(input), 'utf8');
        const nested = parseNested(text, options.json5 ? 'json5' : 'json');

        if (options.debug) {
          console.error('=== DEBUG: Flatten Settings ===');
          console.error(JSON.stringify({ prefix: options.prefix, style, depth: options.depth, preserveArrays: options.preserveArrays }, null, 2));
          console.error('=== END DEBUG ===');
        }

        flat = options.preserveArrays
          ? flattenPreservingSequences(nested, options.prefix, style, options.depth)
          : flatten(nested, options.prefix, style, options.depth);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        program.error(`Error flattening ${input}: ${message}`, { exitCode: 1 });
      }

      const jsonOutput = options.minify
        ? JSON.stringify(flat)
        : JSON.stringify(flat, null, 2);

      if (output) {
        const outputPath = path.resolve(output);
        fs.writeFileSync(outputPath, jsonOutput + '\n', 'utf8');
        console.error(`Successfully flattened ${input} to ${output}`);
      } else {
        console.log(jsonOutput);
      }
    });

  program
    .command('styles')
    .description('List the predefined separator styles')
    .action(() => {
      for (const [name, style] of Object.entries(SeparatorStyles)) {
        console.log(`${name.padEnd(12)}${exampleKey(style, ['a', 'b', 'c'])}`);
      }
    });

  return program;
}
