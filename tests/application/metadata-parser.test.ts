import { describe, it, expect } from 'vitest';
import { MetadataParser } from '../../src/application/metadata-parser.js';
import { tokenizeLine } from '../../src/application/tokenizer.js';
import {
  DuplicateAnnotationError,
  MissingCategoryBeforeWalletError,
  UnrecognizedAnnotationError,
} from '../../src/domain/index.js';
import { makeVocabulary } from '../helpers.js';

const parser = new MetadataParser(makeVocabulary());

describe('MetadataParser.parseLine', () => {
  it('assigns every slot of a fully annotated line', () => {
    const { metadata, body } = parser.parseLine(
      '2025-06-25T20:15:37.882709Z [shutoff] [wallet/wallet.h:937] [WalletLogPrintf] [all:info] [Waleto] Releasing wallet Waleto..',
    );

    expect(metadata).toEqual({
      timestamp: '2025-06-25T20:15:37.882709Z',
      thread: 'shutoff',
      source_file: 'wallet/wallet.h',
      source_line: 937,
      function: 'WalletLogPrintf',
      category: 'all',
      loglevel: 'info',
      wallet_name: 'Waleto',
    });
    expect(body).toBe('Releasing wallet Waleto..');
  });

  it('sets only the timestamp when there are no annotations', () => {
    const { metadata, body } = parser.parseLine('2025-06-25T20:15:37.882709Z Bitcoin Core version v29.0');
    expect(metadata).toEqual({ timestamp: '2025-06-25T20:15:37.882709Z' });
    expect(Object.keys(metadata)).toEqual(['timestamp']);
    expect(body).toBe('Bitcoin Core version v29.0');
  });

  it('accepts a category without a level', () => {
    const { metadata } = parser.parseLine('T1 [cmpctblock] Initialized');
    expect(metadata).toEqual({ timestamp: 'T1', category: 'cmpctblock' });
    expect(metadata.loglevel).toBeUndefined();
  });

  it('splits category and level', () => {
    const { metadata } = parser.parseLine('T1 [net:debug] hello');
    expect(metadata.category).toBe('net');
    expect(metadata.loglevel).toBe('debug');
  });

  it('reads a name that is both a thread and a category by position', () => {
    const { metadata } = parser.parseLine('T1 [net] [net] hello');
    expect(metadata.thread).toBe('net');
    expect(metadata.category).toBe('net');
  });

  it('recognizes numbered worker threads', () => {
    expect(parser.parseLine('T1 [scriptch.3] [validation] x').metadata.thread).toBe('scriptch.3');
    expect(parser.parseLine('T1 [httpworker.12] [all] x').metadata.thread).toBe('httpworker.12');
  });

  it('recognizes operator function names', () => {
    const { metadata } = parser.parseLine('T1 [operator()] [net] x');
    expect(metadata.function).toBe('operator()');
  });

  it('reads source locations in .cpp files', () => {
    const { metadata } = parser.parseLine('T1 [net_processing.cpp:1154] [net] x');
    expect(metadata.source_file).toBe('net_processing.cpp');
    expect(metadata.source_line).toBe(1154);
  });

  it('throws MissingCategoryBeforeWalletError when a wallet name has no category before it', () => {
    expect(() => parser.parseLine('T1 [msghand] [Waleto] x')).toThrow(MissingCategoryBeforeWalletError);
  });

  it('throws MissingCategoryBeforeWalletError for a lone unknown annotation', () => {
    expect(() => parser.parseLine('T1 [mystery] x')).toThrow(MissingCategoryBeforeWalletError);
  });

  it('throws UnrecognizedAnnotationError naming the token', () => {
    const line = 'T1 [bad-token!] [net] x';
    try {
      parser.parseLine(line);
      expect.unreachable();
    } catch (err: unknown) {
      expect(err).toBeInstanceOf(UnrecognizedAnnotationError);
      const e = err as UnrecognizedAnnotationError;
      expect(e.annotation).toBe('bad-token!');
      expect(e.line).toBe(line);
    }
  });

  it('does not take a dotted name without digits as a worker thread', () => {
    expect(() => parser.parseLine('T1 [httpworker.x] [net] x')).toThrow(UnrecognizedAnnotationError);
  });

  it('throws DuplicateAnnotationError when two annotations fill one slot', () => {
    try {
      parser.parseLine('T1 [Foo] [Bar] [net] x');
      expect.unreachable();
    } catch (err: unknown) {
      expect(err).toBeInstanceOf(DuplicateAnnotationError);
      expect((err as DuplicateAnnotationError).slot).toBe('function');
      expect((err as DuplicateAnnotationError).annotation).toBe('Bar');
    }
  });

  it('escapes category names before building the pattern', () => {
    const dotted = new MetadataParser({
      categories: new Set(['a.b']),
      threads: new Set(),
      numberedThreadPrefixes: [],
    });
    expect(dotted.parseLine('T1 [a.b] x').metadata.category).toBe('a.b');
    expect(() => dotted.parseLine('T1 [axb] x')).toThrow(MissingCategoryBeforeWalletError);
  });
});

describe('MetadataParser round trip', () => {
  const lines = [
    '2025-06-25T20:15:37.882709Z [shutoff] [wallet/wallet.h:937] [WalletLogPrintf] [all:info] [Waleto] Releasing wallet Waleto..',
    '2025-07-11T17:07:36.000000Z [msghand] [net]     - Max send per-rtt: 14480 bytes',
    '2025-07-11T17:07:36.000000Z [cmpctblock] Initialized PartiallyDownloadedBlock for block 00aa using a cmpctblock of 100 bytes',
    '2025-07-11T17:07:36.000000Z no annotations [but brackets] later',
  ];

  it.each(lines)('re-parsing the reassembled line gives the same result: %s', (line) => {
    const tokens = tokenizeLine(line);
    const reassembled = `${tokens.timestamp} ${tokens.rawMetadata}${tokens.body}`;

    expect(parser.parseLine(reassembled)).toEqual(parser.parseLine(line));
    expect(tokenizeLine(reassembled)).toEqual(tokens);
  });
});
