#!/usr/bin/env npx tsx
/**
 * CLI script to check whether one union type can be used where another is
 * expected, and to look up builtin function signatures
 * Usage: npx tsx scripts/check-cast.ts <source> <target> [options]
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { resolve } from 'node:path';
import { UnionType } from '../src/union/index.js';
import { BuiltinRegistry } from '../src/builtins/index.js';
import { QualifiedName } from '../src/types/qualified-name.js';
import { checkCast, formatIssuesAsJSON, formatIssuesAsText } from '../src/output/index.js';
import type { Issue } from '../src/output/index.js';

const DEFAULT_BUILTINS = fileURLToPath(new URL('../data/builtins.json', import.meta.url));

function usage(): void {
  console.log('Usage: npx tsx scripts/check-cast.ts <source> <target> [options]');
  console.log('       npx tsx scripts/check-cast.ts --function=<\\name> [options]');
  console.log('');
  console.log('Options:');
  console.log('  --format=text       One issue per line (default)');
  console.log('  --format=json       Analysis response JSON');
  console.log('  --path=<file>       Path reported in issues (default: <input>)');
  console.log('  --line=<n>          Line reported in issues (default: 1)');
  console.log('  --builtins=<file>   Builtin type tables (default: data/builtins.json)');
  console.log('  --function=<name>   Print the signature of a builtin function');
}

function loadRegistry(filePath: string): BuiltinRegistry {
  const absolutePath = resolve(process.cwd(), filePath);
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(absolutePath, 'utf-8'));
  } catch (err) {
    console.error(`Error: Could not read builtin tables '${absolutePath}'`);
    throw err;
  }
  return BuiltinRegistry.fromTables(raw);
}

function printSignature(registry: BuiltinRegistry, name: string): void {
  const qualifiedName = QualifiedName.fromString(name);
  if (!registry.signatureExists(qualifiedName)) {
    console.error(`No builtin signature for ${name}`);
    process.exitCode = 1;
    return;
  }
  const params = [...registry.functionParameterTypes(qualifiedName)]
    .map(([param, type]) => `${type.serialize()} $${param}`)
    .join(', ');
  console.log(`${name}(${params}) : ${registry.functionReturnType(qualifiedName).serialize()}`);
}

function reportParseErrors(label: string, text: string): UnionType {
  const { type, errors } = UnionType.parse(text);
  for (const err of errors) {
    console.error(`Warning: ${label} type '${text}' at ${err.offset}: ${err.message}`);
  }
  return type;
}

function main(): void {
  const args = process.argv.slice(2);

  if (args.length === 0) {
    usage();
    process.exit(1);
  }

  // Parse arguments
  const positional: string[] = [];
  let format = 'text';
  let path = '<input>';
  let line = 1;
  let builtinsPath = DEFAULT_BUILTINS;
  let functionName: string | null = null;

  for (const arg of args) {
    if (arg.startsWith('--format=')) {
      format = arg.slice('--format='.length);
    } else if (arg.startsWith('--path=')) {
      path = arg.slice('--path='.length);
    } else if (arg.startsWith('--line=')) {
      line = Number.parseInt(arg.slice('--line='.length), 10) || 1;
    } else if (arg.startsWith('--builtins=')) {
      builtinsPath = arg.slice('--builtins='.length);
    } else if (arg.startsWith('--function=')) {
      functionName = arg.slice('--function='.length);
    } else if (!arg.startsWith('--')) {
      positional.push(arg);
    }
  }

  if (functionName !== null) {
    const registry = loadRegistry(builtinsPath);
    console.error(`Loaded ${registry.functionCount} builtin functions, ${registry.classCount} classes`);
    printSignature(registry, functionName);
    if (positional.length === 0) return;
  }

  const [sourceText, targetText] = positional;
  if (sourceText === undefined || targetText === undefined) {
    console.error('Error: Expected a source and a target type');
    process.exit(1);
  }

  const source = reportParseErrors('source', sourceText);
  const target = reportParseErrors('target', targetText);

  const issue = checkCast({ checkName: 'TypeMismatch', source, target, path, line });
  const issues: Issue[] = issue === null ? [] : [issue];

  switch (format) {
    case 'json':
      console.log(formatIssuesAsJSON(issues));
      break;
    case 'text':
    default:
      console.log(issues.length === 0 ? `${source} -> ${target}: castable` : formatIssuesAsText(issues));
      break;
  }

  if (issues.length > 0) {
    process.exitCode = 2;
  }
}

main();
