import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { Command, Option } from 'commander';
import { loadSettings } from '../config/settings.js';
import type { AppSettings } from '../config/settings.js';
import type { ErrorKind } from '../control-plane/errors.js';
import { PipelineOrchestrator } from '../control-plane/orchestrator.js';
import type { AnalysisRequest, Logger, OutputFormat, TerminalEvent } from '../control-plane/types.js';
import type { UsageCounters } from '../analysis/schemas.js';
import { FileStateJournal } from '../ledger/journal.js';
import type { PipelineState } from '../ledger/types.js';
import { FileResultCache } from '../tools/cache.js';
import { OpenAiCapability } from '../tools/capability.js';
import { FileDocumentStore } from '../tools/documents.js';

const stderrLogger: Logger = {
  log: (...args: unknown[]) => console.error(...args),
  warn: (...args: unknown[]) => console.warn(...args),
  error: (...args: unknown[]) => console.error(...args),
};

export function createOrchestrator(settings: AppSettings, logger: Logger = console): PipelineOrchestrator {
  return new PipelineOrchestrator({
    documents: new FileDocumentStore(settings.documentsDir),
    capability: new OpenAiCapability({ apiKey: settings.apiKey, baseUrl: settings.baseUrl }),
    cache: new FileResultCache(settings.cacheDir, { ttlMs: settings.cacheTtlMs, logger }),
    journal: settings.statesDir ? new FileStateJournal(settings.statesDir) : null,
    settings: settings.pipeline,
    logger,
  });
}

interface KeyOptions {
  extraction: string;
  analysis: string;
}

function toRequest(subject: string, opts: KeyOptions): AnalysisRequest {
  return { subject, extraction: opts.extraction, analysis: opts.analysis };
}

function withKeyOptions(command: Command): Command {
  return command
    .argument('<subject>', 'Ticker or company code (e.g., AAPL)')
    .option('--extraction <choice>', 'Extraction capability id, or auto', 'auto')
    .option('--analysis <choice>', 'Analysis capability id, or auto', 'auto');
}

export function formatUsage(usage: UsageCounters): string {
  return (
    `calls=${usage.calls} prompt_tokens=${usage.promptTokens} ` +
    `completion_tokens=${usage.completionTokens} cost_usd=${usage.costUsd.toFixed(6)}`
  );
}

async function emitOutputs(out: string, format: OutputFormat, state: PipelineState): Promise<string[]> {
  await mkdir(out, { recursive: true });
  const written: string[] = [];

  const ledgerPath = join(out, `${state.runId}-ledger.json`);
  await writeFile(ledgerPath, JSON.stringify(state, null, 2));
  written.push(ledgerPath);

  if (state.report) {
    const reportPath = join(out, `${state.runId}-report.${format}`);
    await writeFile(
      reportPath,
      format === 'md' ? state.report.markdown : JSON.stringify(state.report, null, 2)
    );
    written.push(reportPath);
  }

  return written;
}

const REMEDIATION: Partial<Record<ErrorKind, string[]>> = {
  UpstreamCapabilityError: [
    'Check OPENROUTER_API_KEY and LLM_BASE_URL',
    'Retry later or pick another capability with --extraction / --analysis',
  ],
  SchemaValidationError: [
    'The model response did not match the expected shape; retry or pick another capability',
  ],
  ConsistencyContradiction: [
    'The extracted statements contradict each other; check the source document',
    'Tolerances can be widened with FINLENS_WARNING_TOLERANCE / FINLENS_CONTRADICTION_TOLERANCE',
  ],
  StageTimeout: [
    'Raise FINLENS_CAPABILITY_TIMEOUT_MS or FINLENS_STAGE_TIMEOUT_MS',
  ],
};

function printFailure(terminal: Extract<TerminalEvent, { status: 'failed' }>): void {
  const { stage, error } = terminal.payload;
  console.error(`\n[finlens] FATAL: stage "${stage}" failed (${error.kind}): ${error.message}`);
  const hints = REMEDIATION[error.kind];
  if (hints) {
    console.error('[finlens] Remediation suggestions:');
    for (const hint of hints) console.error(`  - ${hint}`);
  }
}

export function buildCli(): Command {
  const program = new Command();

  program
    .name('finlens')
    .description(
      'Financial statement analyzer.\n\n' +
      'Extracts facts from a filing with a generative model, derives metrics deterministically,\n' +
      'cross-checks the statements and writes an investor report with an audit ledger.'
    )
    .version('0.1.0');

  withKeyOptions(program.command('analyze'))
    .description('Run (or replay from cache) the analysis pipeline for a subject')
    .addOption(new Option('--format <format>', 'Report format').choices(['md', 'json']).default('md'))
    .option('--out <path>', 'Output directory', './out')
    .option('--ndjson', 'Print one JSON progress event per line on stdout')
    .action(async (subject: string, opts: KeyOptions & { format: OutputFormat; out: string; ndjson?: boolean }) => {
      const logger = opts.ndjson ? stderrLogger : console;
      const orchestrator = createOrchestrator(loadSettings(), logger);

      const { handle, origin } = await orchestrator.start(toRequest(subject, opts));
      logger.log(
        origin === 'cache'
          ? `[finlens] cache hit ${handle.keyId}`
          : `[finlens] run ${origin} ${handle.runId}`
      );

      let terminal: TerminalEvent | null = null;
      for await (const event of orchestrator.subscribe(handle)) {
        if (opts.ndjson) process.stdout.write(`${JSON.stringify(event)}\n`);
        if (event.type === 'terminal') terminal = event;
      }

      const written = await emitOutputs(opts.out, opts.format, orchestrator.getState(handle));
      for (const path of written) logger.log(`[finlens] wrote ${path}`);

      if (!terminal || terminal.status === 'failed') {
        if (terminal) printFailure(terminal);
        process.exit(2);
      }
      logger.log(`[finlens] done. total usage: ${formatUsage(terminal.payload.usage.total)}`);
    });

  withKeyOptions(program.command('check'))
    .description('Report whether a completed analysis is cached for a subject')
    .action(async (subject: string, opts: KeyOptions) => {
      const entry = await createOrchestrator(loadSettings()).check(toRequest(subject, opts));
      if (!entry) {
        console.log(`[finlens] no cached analysis for ${subject.trim().toUpperCase()}`);
        process.exit(1);
      }
      console.log(`key:       ${entry.keyId}`);
      console.log(`run:       ${entry.state.runId}`);
      console.log(`stored at: ${entry.storedAt}`);
      console.log(`usage:     ${formatUsage(entry.usage.total)}`);
    });

  withKeyOptions(program.command('result'))
    .description('Print the cached report for a subject')
    .action(async (subject: string, opts: KeyOptions) => {
      const found = await createOrchestrator(loadSettings()).result(toRequest(subject, opts));
      if (!found) {
        console.error(`[finlens] no cached analysis for ${subject.trim().toUpperCase()}`);
        process.exit(1);
      }
      console.log(found.report.markdown);
      console.log(`[finlens] usage: ${formatUsage(found.usage.total)}`);
    });

  withKeyOptions(program.command('evict'))
    .description('Remove the cached analysis for a subject')
    .action(async (subject: string, opts: KeyOptions) => {
      await createOrchestrator(loadSettings()).invalidate(toRequest(subject, opts));
    });

  return program;
}
