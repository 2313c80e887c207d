/**
 * File exchange channel tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, readdir, rm, stat, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { basename, dirname, join } from 'node:path';
import {
  FileExchangeChannel,
  INPUT_FILE_NAME,
  OUTPUT_FILE_NAME,
  toExchangeTable,
} from '../../../scoring/exchange-channel.js';
import { validated } from '../../utils/fixtures.js';

describe('toExchangeTable', () => {
  it('puts the identifier first under its canonical name', () => {
    const table = validated({
      columns: ['tenure', 'customer_id', 'Contract'],
      rows: [
        ['2', 'A', 'Month-to-month'],
        ['30', 'B', 'One year'],
      ],
    });

    expect(toExchangeTable(table)).toEqual({
      columns: ['customerID', 'tenure', 'Contract'],
      rows: [
        ['A', '2', 'Month-to-month'],
        ['B', '30', 'One year'],
      ],
    });
  });

  it('writes cells of columns named like object prototype keys', () => {
    const table = validated({
      columns: ['customerID', '__proto__', 'constructor'],
      rows: [['A', 'x', 'y']],
    });

    expect(toExchangeTable(table)).toEqual({
      columns: ['customerID', '__proto__', 'constructor'],
      rows: [['A', 'x', 'y']],
    });
  });
});

describe('FileExchangeChannel', () => {
  let baseDir: string;

  beforeEach(async () => {
    baseDir = await mkdtemp(join(tmpdir(), 'churnline-channel-test-'));
  });

  afterEach(async () => {
    await rm(baseDir, { recursive: true, force: true });
  });

  it('opens a private directory per session', async () => {
    const channel = new FileExchangeChannel(baseDir);
    const first = await channel.open();
    const second = await channel.open();

    expect(channel.kind).toBe('file');
    expect(dirname(first.inputLocation)).not.toBe(dirname(second.inputLocation));
    expect(basename(first.inputLocation)).toBe(INPUT_FILE_NAME);
    expect(basename(first.outputLocation)).toBe(OUTPUT_FILE_NAME);
    expect(basename(dirname(first.inputLocation)).startsWith('churnline-run-')).toBe(true);

    await first.dispose();
    await second.dispose();
  });

  it('writes the input as CSV', async () => {
    const session = await new FileExchangeChannel(baseDir).open();
    await session.writeInput(validated());

    expect(await readFile(session.inputLocation, 'utf-8')).toBe(
      'customerID,tenure,MonthlyCharges,Contract\nA,2,95,Month-to-month\nB,30,50,One year\nC,60,25,Two year\n'
    );
    await session.dispose();
  });

  it('reads the output back, or null when there is none', async () => {
    const session = await new FileExchangeChannel(baseDir).open();
    expect(await session.readOutput()).toBeNull();

    await writeFile(session.outputLocation, 'customerID,churn_probability\nA,0.5\n');
    expect(await session.readOutput()).toEqual({
      columns: ['customerID', 'churn_probability'],
      rows: [['A', '0.5']],
    });
    await session.dispose();
  });

  it('removes the session directory on dispose', async () => {
    const session = await new FileExchangeChannel(baseDir).open();
    await session.writeInput(validated());
    const dir = dirname(session.inputLocation);
    expect((await stat(dir)).isDirectory()).toBe(true);

    await session.dispose();

    expect(await readdir(baseDir)).toEqual([]);
  });
});
