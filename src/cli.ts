#!/usr/bin/env node
/**
 * lrcscribe CLI — transcribe audio and export word timings as LRC
 */

import dotenv from 'dotenv';
// Load .env — override only empty or unset env vars
const _dotenvResult = dotenv.config();
if (_dotenvResult.parsed) {
  for (const [k, v] of Object.entries(_dotenvResult.parsed)) {
    if (process.env[k] === '' || process.env[k] === undefined) process.env[k] = v;
  }
}

import { Command, InvalidArgumentError } from 'commander';
import { loadConfig, parseModel } from './core/config.js';
import type { ConfigOverrides } from './core/config.js';
import { errorMessage } from './core/errors.js';
import { runCommand } from './command.js';
import { Orchestrator } from './orchestrator/index.js';
import { createLogger } from './services/logger.js';
import type { GroupingPolicy, LrcTags } from './core/types.js';

interface GlobalOptions {
  config?: string;
  verbose?: boolean;
}

interface TranscribeCliOptions {
  model?: string;
  output?: string;
  timeout?: number;
}

interface PreviewCliOptions {
  limit?: number;
  wordData?: boolean;
}

interface LrcCliOptions {
  output?: string;
  maxWords?: number;
  maxGap?: number | null;
  sentenceBoundary: boolean;
  title?: string;
  artist?: string;
  album?: string;
}

interface AutoLrcCliOptions extends TranscribeCliOptions, Omit<LrcCliOptions, 'output'> {
  lrcOutput?: string;
}

function positiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

function gapMs(value: string): number | null {
  if (value === 'off') return null;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError("Must be a non-negative integer or 'off'.");
  }
  return parsed;
}

function modelName(value: string): string {
  try {
    return parseModel(value);
  } catch (error) {
    throw new InvalidArgumentError(errorMessage(error));
  }
}

const program = new Command();

program
  .name('lrcscribe')
  .description('Transcribe audio with AssemblyAI and export word timings as LRC')
  .version('0.1.0')
  .option('-c, --config <path>', 'YAML config file (grouping policy, model, timeouts)')
  .option('-v, --verbose', 'Debug logging');

function createOrchestrator(overrides: ConfigOverrides = {}): Orchestrator {
  const global = program.opts<GlobalOptions>();
  const config = loadConfig({ configFile: global.config, overrides });
  const logger = createLogger({ level: global.verbose ? 'debug' : config.logLevel, logDir: config.logDir });
  return new Orchestrator({ config, logger });
}

function groupingFrom(opts: Omit<LrcCliOptions, 'output'>, cmd: Command): Partial<GroupingPolicy> {
  const policy: Partial<GroupingPolicy> = {};
  if (opts.maxWords !== undefined) policy.maxWordsPerLine = opts.maxWords;
  if (opts.maxGap !== undefined) policy.maxGapMs = opts.maxGap;
  if (cmd.getOptionValueSource('sentenceBoundary') === 'cli') policy.sentenceBoundary = opts.sentenceBoundary;
  return policy;
}

function tagsFrom(opts: Omit<LrcCliOptions, 'output'>): LrcTags {
  return { ti: opts.title, ar: opts.artist, al: opts.album };
}

function withLrcOptions(cmd: Command): Command {
  return cmd
    .option('--max-words <n>', 'Maximum words per LRC line (default 8)', positiveInt)
    .option('--max-gap <ms>', "Start a new line after this much silence, or 'off' (default 1500)", gapMs)
    .option('--no-sentence-boundary', 'Do not break lines at terminal punctuation')
    .option('--title <title>', 'Write an [ti:] tag')
    .option('--artist <artist>', 'Write an [ar:] tag')
    .option('--album <album>', 'Write an [al:] tag');
}

function withTranscribeOptions(cmd: Command): Command {
  return cmd
    .option('-m, --model <name>', 'Speech model: universal (word timestamps) or slam-1 (beta)', modelName)
    .option('--timeout <seconds>', 'Polling timeout in seconds (default 300)', positiveInt);
}

async function run(task: () => Promise<void> | void): Promise<void> {
  const code = await runCommand(task);
  if (code !== 0) process.exitCode = code;
}

withTranscribeOptions(
  program
    .command('transcribe')
    .description('Transcribe an audio file and save <audio>.transcript.json')
    .argument('<audio>', 'Audio file (mp3/wav/m4a)')
    .option('-o, --output <path>', 'Output JSON path'),
).action((audio: string, opts: TranscribeCliOptions) => run(async () => {
  const orch = createOrchestrator({ model: opts.model, timeoutSeconds: opts.timeout });
  const outcome = await orch.transcribe(audio, { output: opts.output });
  orch.printPreview(outcome.words, { limit: 30 });
}));

program
  .command('parse')
  .description('Show the word-level timestamps of a transcript JSON')
  .argument('<json>', 'Transcript JSON')
  .option('-n, --limit <n>', 'Show only the first n words', positiveInt)
  .option('--word-data', 'Print word data as JSON instead of the listing')
  .action((json: string, opts: PreviewCliOptions) => run(() => {
    createOrchestrator().preview(json, opts);
  }));

withLrcOptions(
  program
    .command('parse-lrc')
    .description('Export a transcript JSON as an .lrc file')
    .argument('<json>', 'Transcript JSON')
    .option('-o, --output <path>', 'Output LRC path (default <json-base>.lrc)'),
).action((json: string, opts: LrcCliOptions, cmd: Command) => run(() => {
  const orch = createOrchestrator({ grouping: groupingFrom(opts, cmd) });
  orch.exportLrc(json, { output: opts.output, tags: tagsFrom(opts), showWords: true });
}));

withTranscribeOptions(
  program
    .command('auto')
    .description('Transcribe, then show the word-level timestamps')
    .argument('<audio>', 'Audio file (mp3/wav/m4a)')
    .option('-o, --output <path>', 'Output JSON path')
    .option('-n, --limit <n>', 'Show only the first n words', positiveInt)
    .option('--word-data', 'Print word data as JSON instead of the listing'),
).action((audio: string, opts: TranscribeCliOptions & PreviewCliOptions) => run(async () => {
  const orch = createOrchestrator({ model: opts.model, timeoutSeconds: opts.timeout });
  await orch.auto(audio, { output: opts.output, limit: opts.limit, wordData: opts.wordData });
}));

withLrcOptions(
  withTranscribeOptions(
    program
      .command('auto-lrc')
      .description('Transcribe, then export an .lrc file')
      .argument('<audio>', 'Audio file (mp3/wav/m4a)')
      .option('-o, --output <path>', 'Output JSON path')
      .option('--lrc-output <path>', 'Output LRC path'),
  ),
).action((audio: string, opts: AutoLrcCliOptions, cmd: Command) => run(async () => {
  const orch = createOrchestrator({
    model: opts.model,
    timeoutSeconds: opts.timeout,
    grouping: groupingFrom(opts, cmd),
  });
  await orch.autoLrc(audio, {
    output: opts.output,
    lrcOutput: opts.lrcOutput,
    tags: tagsFrom(opts),
  });
}));

program.addHelpText('after', `
Environment:
  ASSEMBLYAI_API_KEY   AssemblyAI API key (AAI_API_KEY is accepted too)

Examples:
  $ lrcscribe transcribe song.mp3
  $ lrcscribe parse song.transcript.json
  $ lrcscribe parse-lrc song.transcript.json --max-words 6
  $ lrcscribe auto-lrc song.mp3 --model universal --title "Song"
`);

await program.parseAsync();
