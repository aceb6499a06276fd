import { Command } from 'commander';
import type { Logger } from 'pino';
import { z } from 'zod';
import {
  LineClassifier,
  MetadataParser,
  buildReport,
  deriveReceivedRows,
  deriveSentRows,
  formatReport,
  isWithinWindow,
  parseCompactBlockLog,
} from '../../application/index.js';
import type { ParseLogResult, TimeWindow } from '../../application/index.js';
import type { LoggerOptions, RuntimeConfig } from '../../infrastructure/index.js';
import { FileLineSource, exportCsv, loadVocabulary, parseLogLevel } from '../../infrastructure/index.js';

/** Side effects of the program, injectable for tests. */
export interface CliDeps {
  readonly config: RuntimeConfig;
  readonly createLogger: (options: LoggerOptions) => Logger;
  /** Receives command output, one line per call. */
  readonly stdout: (line: string) => void;
}

const globalOptionsSchema = z.object({
  logLevel: z.string().optional(),
  vocabulary: z.string().optional(),
  from: z.string().optional(),
  to: z.string().optional(),
});

type GlobalOptions = z.infer<typeof globalOptionsSchema>;

interface RunContext {
  readonly log: Logger;
  readonly options: GlobalOptions;
}

function createContext(command: Command, deps: CliDeps): RunContext {
  const options = globalOptionsSchema.parse(command.optsWithGlobals());
  const level = options.logLevel === undefined ? deps.config.logLevel : parseLogLevel(options.logLevel);
  return { log: deps.createLogger({ level }), options };
}

async function runParse(logfile: string, ctx: RunContext, deps: CliDeps): Promise<ParseLogResult> {
  const vocabulary = loadVocabulary(ctx.options.vocabulary ?? deps.config.vocabularyPath);
  const window: TimeWindow = { from: ctx.options.from, to: ctx.options.to };
  const source = await FileLineSource.open(logfile);

  try {
    const parsed = await parseCompactBlockLog(source, {
      parser: new MetadataParser(vocabulary),
      classifier: new LineClassifier(),
      log: ctx.log,
      window,
    });

    ctx.log.info(
      {
        logfile,
        blocks_received: parsed.result.received.size,
        blocks_sent: parsed.result.sent.size,
        ...parsed.lines,
        ...parsed.correlation,
      },
      'Log parsed',
    );

    return parsed;
  } finally {
    source.close();
  }
}

/**
 * Builds the `cblog` command tree.
 *
 * Commands:
 *   parse <logfile> [outdir]         → received.csv + sent.csv
 *   stats <logfile>                  → summary statistics on stdout
 *   filter <logfile> <from> <to>     → lines inside the time window on stdout
 */
export function buildProgram(deps: CliDeps): Command {
  const program = new Command();

  program
    .name('cblog')
    .description('Extract compact block relay events from a node debug log')
    .version('0.1.0')
    .option('--log-level <level>', 'Log level (fatal, error, warn, info, debug, trace, silent)')
    .option('--vocabulary <path>', 'Vocabulary JSON with category and thread names')
    .option('--from <timestamp>', 'Ignore lines before this timestamp (inclusive bound)')
    .option('--to <timestamp>', 'Ignore lines after this timestamp (inclusive bound)');

  program
    .command('parse')
    .description('Parse a log file into received.csv and sent.csv')
    .argument('<logfile>', 'Path to the debug log')
    .argument('[outdir]', 'Directory for the CSV files')
    .action(async (logfile: string, outdir: string | undefined, _opts: unknown, command: Command) => {
      const ctx = createContext(command, deps);
      const { result } = await runParse(logfile, ctx, deps);
      const paths = await exportCsv(
        outdir ?? deps.config.outputDir,
        deriveReceivedRows(result),
        deriveSentRows(result),
      );
      ctx.log.info({ ...paths }, 'CSV files written');
    });

  program
    .command('stats')
    .description('Parse a log file and print summary statistics')
    .argument('<logfile>', 'Path to the debug log')
    .action(async (logfile: string, _opts: unknown, command: Command) => {
      const ctx = createContext(command, deps);
      const { result } = await runParse(logfile, ctx, deps);
      for (const line of formatReport(buildReport(result))) {
        deps.stdout(line);
      }
    });

  program
    .command('filter')
    .description('Print the lines whose timestamp lies within [from, to]')
    .argument('<logfile>', 'Path to the debug log')
    .argument('<from>', 'Start timestamp, e.g. 2025-07-11T17:07:36.000000Z')
    .argument('<to>', 'End timestamp, e.g. 2025-07-11T17:07:37.000000Z')
    .action(async (logfile: string, from: string, to: string, _opts: unknown, command: Command) => {
      const ctx = createContext(command, deps);
      const source = await FileLineSource.open(logfile);
      let kept = 0;
      try {
        for (let line = await source.nextLine(); line !== null; line = await source.nextLine()) {
          const timestamp = line.trimStart().split(/\s/, 1)[0] ?? '';
          if (timestamp === '' || !isWithinWindow(timestamp, { from, to })) continue;
          deps.stdout(line);
          kept++;
        }
      } finally {
        source.close();
      }
      ctx.log.debug({ logfile, from, to, kept }, 'Filter complete');
    });

  return program;
}
