#!/usr/bin/env node
import 'dotenv/config';
import { parseBoolean } from './config/pipeline.js';
import { runBuild } from './pipeline.js';
import { log } from './utils/log.js';
import { TARGET_FORMATS, type TargetFormat } from './types/index.js';

process.on('uncaughtException', (error) => {
  log.error('Uncaught exception', error);
  process.exit(1);
});

type CliArgs = Record<string, string | boolean | string[]>;

function parseCliArgs(tokens: string[]): CliArgs {
  const result: CliArgs = {};

  for (let i = 0; i < tokens.length; i++) {
    let token = tokens[i];
    if (token === '--') continue;
    if (!token.startsWith('--')) continue;

    token = token.slice(2);
    if (!token) continue;

    let value: string | boolean = true;
    let key = token;

    if (token.includes('=')) {
      const [k, v] = token.split(/=(.*)/s, 2);
      key = k;
      value = v ?? true;
    } else {
      const next = tokens[i + 1];
      if (next && !next.startsWith('--')) {
        value = next;
        i++;
      }
    }

    const existing = result[key];
    if (existing === undefined) {
      result[key] = value;
    } else if (Array.isArray(existing)) {
      existing.push(String(value));
    } else {
      result[key] = [String(existing), String(value)];
    }
  }

  return result;
}

function getStringArg(args: CliArgs, key: string): string | undefined {
  const value = args[key];
  if (value === undefined) return undefined;
  if (Array.isArray(value)) return value[value.length - 1];
  if (typeof value === 'boolean') return value ? 'true' : 'false';
  return value;
}

function getStringArrayArg(args: CliArgs, key: string): string[] | undefined {
  const value = args[key];
  if (value === undefined) return undefined;
  const values = Array.isArray(value) ? value : [String(value)];
  return values.flatMap((entry) => entry.split(',')).map((entry) => entry.trim()).filter(Boolean);
}

function isTargetFormat(value: string): value is TargetFormat {
  return TARGET_FORMATS.some((format) => format === value);
}

function resolveFormats(values: string[] | undefined): TargetFormat[] {
  if (!values?.length) return [...TARGET_FORMATS];
  const formats: TargetFormat[] = [];
  for (const value of values) {
    if (!isTargetFormat(value)) {
      throw new Error(`Unknown output format "${value}" (expected one of ${TARGET_FORMATS.join(', ')})`);
    }
    if (!formats.includes(value)) formats.push(value);
  }
  return formats;
}

async function main() {
  const rawArgs = parseCliArgs(process.argv.slice(2));

  const formats = resolveFormats(getStringArrayArg(rawArgs, 'format'));
  const skipDiffs = parseBoolean(getStringArg(rawArgs, 'skip-diffs') ?? process.env.SKIP_DIFFS, false);

  log.info('Knowledge base build started', { formats, skipDiffs });

  const result = await runBuild({
    configPath: getStringArg(rawArgs, 'config'),
    dataRoot: getStringArg(rawArgs, 'data-root'),
    outputDir: getStringArg(rawArgs, 'output-dir'),
    formats,
    skipDiffs
  });

  log.info('Knowledge base build finished', {
    entries: result.knowledgeBase.size,
    outputs: result.outputs
  });
}

main().catch((error) => {
  log.error('Pipeline failed', error);
  process.exitCode = 1;
});
