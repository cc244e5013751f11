#!/usr/bin/env node

/**
 * Command line interface for glyphproof
 *
 *   glyphproof word --glyphs "HAMBURGEFONTSIV"
 *   glyphproof sentence --vocab es_sample --seed 7
 *   glyphproof top --glyphs "hot" -n 5
 */

import { Command, InvalidArgumentError } from 'commander';
import { config } from 'dotenv';
import {
  ValidationError,
  isCaseMode,
  setDebug,
  CASE_MODES,
  type CaseMode,
  type ProofGenerator,
  type Seed,
  type TextOptions
} from '@glyphproof/core';
import { createDefaultGenerator } from '@glyphproof/data';

// Parse environment variables
config();

export const CLI_COMMANDS = ['word', 'words', 'top', 'sentence', 'paragraph', 'text', 'vocabs'] as const;
export type CliCommand = (typeof CLI_COMMANDS)[number];

export interface CliOptions {
  vocab?: string;
  glyphs?: string;
  seed?: string;
  case?: string;
  randomness?: number;
  minLength?: number;
  maxLength?: number;
  length?: number;
  startsWith?: string;
  endsWith?: string;
  contains?: string[];
  inner?: string[];
  regex?: string;
  topK?: number;
  numberProbability?: number;
  punctuationRandomness?: number;
  raiseErrors?: boolean;
  /** Words for `words`, entries for `top`, sentences for `paragraph`, paragraphs for `text` */
  count?: number;
  index?: number;
}

/** Numeric seeds stay numbers so `--seed 7` matches `seed: 7` in code */
export function parseSeed(value: string): Seed {
  return /^-?\d+$/.test(value) ? parseInt(value, 10) : value;
}

function parseCase(value: string | undefined): CaseMode | undefined {
  if (value === undefined) return undefined;
  if (!isCaseMode(value)) {
    throw new ValidationError(`Unknown case mode "${value}" (expected one of: ${CASE_MODES.join(', ')})`);
  }
  return value;
}

function generationOptions(options: CliOptions): TextOptions {
  return {
    vocab: options.vocab ?? process.env.GLYPHPROOF_VOCAB,
    glyphs: options.glyphs ?? process.env.GLYPHPROOF_GLYPHS,
    seed: options.seed !== undefined ? parseSeed(options.seed) : undefined,
    case: parseCase(options.case),
    randomness: options.randomness,
    minLength: options.minLength,
    maxLength: options.maxLength,
    exactLength: options.length,
    startsWith: options.startsWith,
    endsWith: options.endsWith,
    contains: options.contains,
    inner: options.inner,
    regex: options.regex,
    topK: options.topK,
    numberProbability: options.numberProbability,
    punctuationRandomness: options.punctuationRandomness,
    raiseErrors: options.raiseErrors,
  };
}

/**
 * Programmatic interface for CLI operations
 * Returns the output string that would be printed to stdout
 */
export function runCli(
  command: CliCommand,
  options: CliOptions = {},
  generator: ProofGenerator = createDefaultGenerator()
): string {
  const base = generationOptions(options);

  switch (command) {
    case 'word':
      return generator.word(base);
    case 'words':
      return generator.words({ ...base, wordCount: options.count }).join(' ');
    case 'top':
      return generator.topWords({ ...base, count: options.count, index: options.index }).join('\n');
    case 'sentence':
      return generator.sentence(base);
    case 'paragraph':
      return generator.paragraph({ ...base, sentenceCount: options.count });
    case 'text':
      return generator.text({ ...base, paragraphCount: options.count });
    case 'vocabs':
      return generator
        .listVocabs()
        .map(name => {
          const table = generator.getVocab(name);
          return `${name}\t${table.language}\t${table.size}`;
        })
        .join('\n');
  }
}

function integer(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return parsed;
}

function probability(value: string): number {
  const parsed = Number(value);
  if (!(parsed >= 0 && parsed <= 1)) {
    throw new InvalidArgumentError('Expected a number between 0 and 1.');
  }
  return parsed;
}

function addGenerationOptions(command: Command): Command {
  return command
    .option('-v, --vocab <name>', 'vocabulary to draw from (default: $GLYPHPROOF_VOCAB or en_sample)')
    .option('-g, --glyphs <chars>', 'available glyphs (default: $GLYPHPROOF_GLYPHS or unconstrained)')
    .option('-s, --seed <seed>', 'seed for repeatable output')
    .option('-c, --case <mode>', `letter case: ${CASE_MODES.join(', ')}`)
    .option('-r, --randomness <r>', '0 follows word frequency, 1 ignores it', probability)
    .option('--min-length <n>', 'minimum word length', integer)
    .option('--max-length <n>', 'maximum word length', integer)
    .option('--length <n>', 'exact word length', integer)
    .option('--starts-with <text>', 'words starting with text')
    .option('--ends-with <text>', 'words ending with text')
    .option('--contains <text...>', 'words containing every text')
    .option('--inner <text...>', 'words containing every text away from the edges')
    .option('--regex <pattern>', 'words fully matching pattern')
    .option('--top-k <n>', 'only sample from the k most frequent words', integer)
    .option('--number-probability <p>', 'chance of a numeral in place of a word', probability)
    .option('--punctuation-randomness <p>', '0 follows punctuation frequency, 1 ignores it', probability)
    .option('--raise-errors', 'fail instead of printing nothing when no word matches')
    .option('-n, --count <n>', 'how many words, entries, sentences or paragraphs', integer)
    .option('--index <n>', 'first frequency rank for top', integer);
}

/**
 * Build the command tree. `write` receives each command's output.
 */
export function buildProgram(
  write: (output: string) => void = output => process.stdout.write(`${output}\n`),
  generatorFactory: () => ProofGenerator = () => createDefaultGenerator()
): Command {
  const program = new Command();

  program
    .name('glyphproof')
    .description('Proofing text limited to the glyphs a typeface has')
    .version('0.1.0')
    .option('-d, --debug', 'print debug information')
    .hook('preAction', thisCommand => {
      if (thisCommand.opts<{ debug?: boolean }>().debug) {
        setDebug(true);
      }
    });

  const descriptions: Record<CliCommand, string> = {
    word: 'a single word',
    words: 'a list of words',
    top: 'the most frequent words, one per line',
    sentence: 'a punctuated sentence',
    paragraph: 'a paragraph of sentences',
    text: 'paragraphs separated by blank lines',
    vocabs: 'list available vocabularies',
  };

  for (const name of CLI_COMMANDS) {
    const command = program.command(name).description(descriptions[name]);
    addGenerationOptions(command).action((options: CliOptions) => {
      write(runCli(name, options, generatorFactory()));
    });
  }

  return program;
}

async function main(): Promise<void> {
  const program = buildProgram();
  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`ERROR: ${message}`);
    process.exit(2);
  }
}

// Run main if this is the entry point
if (import.meta.url === `file://${process.argv[1]}`) {
  main().catch((error) => {
    console.error(`FATAL: ${error}`);
    process.exit(2);
  });
}
