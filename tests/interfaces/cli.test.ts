import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import pino from 'pino';
import { buildProgram } from '../../src/interfaces/cli/index.js';
import { ConfigError } from '../../src/domain/index.js';

const LOG_LINES = [
  '2025-07-11T17:07:36.000000Z [msghand] [cmpctblock] Initialized PartiallyDownloadedBlock for block 00aa using a cmpctblock of 25000 bytes',
  '2025-07-11T17:07:36.010000Z [msghand] [net] PeerManager::NewPoWValidBlock sending header-and-ids 00aa to peer=7',
  '2025-07-11T17:07:36.011000Z [msghand] [net] sending cmpctblock (27000 bytes) peer=7',
  '2025-07-11T17:07:36.011500Z [msghand] [net]     - Max send per-rtt: 14480 bytes',
  '2025-07-11T17:07:36.012500Z [msghand] [cmpctblock] Successfully reconstructed block 00aa with 1 txn prefilled, 10 txn from mempool (incl at least 0 from extra pool) and 0 txn (0 bytes) requested',
];

describe('cblog', () => {
  let dir: string;
  let logfile: string;
  let output: string[];

  function run(...args: string[]): Promise<unknown> {
    const program = buildProgram({
      config: { logLevel: 'silent', vocabularyPath: undefined, outputDir: join(dir, 'default-out') },
      createLogger: () => pino({ level: 'silent' }),
      stdout: (line) => output.push(line),
    });
    program.exitOverride();
    return program.parseAsync(args, { from: 'user' });
  }

  beforeEach(async () => {
    dir = await mkdtemp(join(process.cwd(), '.tmp-test-'));
    logfile = join(dir, 'debug.log');
    await writeFile(logfile, LOG_LINES.join('\n') + '\n', 'utf-8');
    output = [];
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  // ── parse ──────────────────────────────────────────────

  it('parse writes received.csv and sent.csv into the given directory', async () => {
    const outdir = join(dir, 'out');
    await run('parse', logfile, outdir);

    const received = (await readFile(join(outdir, 'received.csv'), 'utf-8')).split('\n');
    const sent = (await readFile(join(outdir, 'sent.csv'), 'utf-8')).split('\n');

    expect(received[1]).toBe('00aa,2025-07-11T17:07:36.000000Z,2025-07-11T17:07:36.012500Z,25000,0,0,12.5');
    expect(sent[1]).toBe('00aa,2025-07-11T17:07:36.011000Z,7,14480,25000,0,0,27000,2000,10520,3960,1');
    expect(output).toEqual([]);
  });

  it('parse falls back to the configured output directory', async () => {
    await run('parse', logfile);
    const received = await readFile(join(dir, 'default-out', 'received.csv'), 'utf-8');
    expect(received.split('\n')).toHaveLength(3);
  });

  // ── stats ──────────────────────────────────────────────

  it('stats prints the report', async () => {
    await run('stats', logfile);

    expect(output).toHaveLength(20);
    expect(output[0]).toBe('0 out of 1 blocks received failed reconstruction. (0.00%)');
    expect(output[5]).toBe('Avg reconstruction time: 12.50ms');
    expect(output[9]).toBe('1/1 blocks were sent with prefills. (100.00%)');
    expect(output[17]).toBe('TCP window size: avg 14480.00 bytes, median 14480, mode 14480');
    expect(output[18]).toBe('The mode represented 1/1 windows. (100.00%)');
    expect(output[19]).toBe('Avg TCP window bytes used: 10520.00 bytes');
  });

  it('stats honours the global --from bound', async () => {
    await run('--from', '2025-07-11T17:07:36.010000Z', 'stats', logfile);
    expect(output[0]).toBe('0 out of 0 blocks received failed reconstruction. (n/a)');
  });

  // ── filter ─────────────────────────────────────────────

  it('filter prints the lines inside the window', async () => {
    await run('filter', logfile, '2025-07-11T17:07:36.010000Z', '2025-07-11T17:07:36.011000Z');
    expect(output).toEqual([LOG_LINES[1], LOG_LINES[2]]);
  });

  // ── errors ─────────────────────────────────────────────

  it('rejects an invalid --log-level', async () => {
    await expect(run('--log-level', 'loud', 'stats', logfile)).rejects.toBeInstanceOf(ConfigError);
  });

  it('rejects a missing vocabulary file', async () => {
    await expect(run('--vocabulary', join(dir, 'missing.json'), 'stats', logfile)).rejects.toBeInstanceOf(
      ConfigError,
    );
  });

  it('rejects a missing log file', async () => {
    await expect(run('stats', join(dir, 'missing.log'))).rejects.toMatchObject({ code: 'ENOENT' });
  });
});
