import { afterEach, describe, expect, it } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import {
  DECLARATIONS_TABLE,
  TRANSACTIONS_TABLE,
  loadTransactions,
  readTable,
} from '../src/index.js';

let tmpDir = '';

afterEach(() => {
  if (tmpDir) {
    rmSync(tmpDir, { recursive: true, force: true });
    tmpDir = '';
  }
});

function writeTable(name: string, content: string): string {
  tmpDir = tmpDir || mkdtempSync(join(tmpdir(), 'table-loader-'));
  const filePath = join(tmpDir, name);
  writeFileSync(filePath, content, 'utf-8');
  return filePath;
}

describe('readTable', () => {
  it('numbers rows like a spreadsheet, skipping blank lines', async () => {
    const filePath = writeTable(
      'transactions.csv',
      '\uFEFFDate,Reference,Amount\n05/01/24,"Smith, J",10.00\n\n06/01/24,Other,"1,250.00"\n'
    );

    const table = await readTable(TRANSACTIONS_TABLE, filePath);

    expect(table.header).toEqual(['Date', 'Reference', 'Amount']);
    expect(table.rows).toEqual([
      { rowNumber: 2, cells: ['05/01/24', 'Smith, J', '10.00'] },
      { rowNumber: 4, cells: ['06/01/24', 'Other', '1,250.00'] },
    ]);

    const loaded = loadTransactions(table.rows);
    expect(loaded.ok).toBe(true);
    if (!loaded.ok) return;
    expect(loaded.records.map((t) => t.amount.pence)).toEqual([1000, 125000]);
  });

  it('returns the bytes it parsed, byte order mark included', async () => {
    const text = '\uFEFFDate,Reference,Amount\r\n05/01/24,Ref,10.00\r\n';
    const filePath = writeTable('in.csv', text);

    const table = await readTable(TRANSACTIONS_TABLE, filePath);

    expect(table.content).toEqual(Buffer.from(text));
  });

  it('matches headers case-insensitively', async () => {
    const filePath = writeTable('transactions.csv', ' date ,REFERENCE,amount\n');

    const table = await readTable(TRANSACTIONS_TABLE, filePath);

    expect(table.rows).toHaveLength(0);
  });

  it('rejects a table whose headers do not match the template', async () => {
    const filePath = writeTable('declarations.csv', 'Title,First Name,Surname\n');

    await expect(readTable(DECLARATIONS_TABLE, filePath)).rejects.toMatchObject({
      code: 'HEADER_MISMATCH',
    });
  });

  it('rejects an empty file', async () => {
    const filePath = writeTable('transactions.csv', '');

    await expect(readTable(TRANSACTIONS_TABLE, filePath)).rejects.toMatchObject({
      code: 'HEADER_MISMATCH',
      message: 'transactions.csv is empty',
    });
  });

  it('reports a missing file', async () => {
    tmpDir = mkdtempSync(join(tmpdir(), 'table-loader-'));

    await expect(
      readTable(TRANSACTIONS_TABLE, join(tmpDir, 'transactions.csv'))
    ).rejects.toMatchObject({
      code: 'FILE_NOT_FOUND',
      message: `There is no file named "transactions.csv" in ${tmpDir}`,
    });
  });

  it('passes rows of the wrong length through for the loader to report', async () => {
    const filePath = writeTable('transactions.csv', 'Date,Reference,Amount\n05/01/24,Only two\n');

    const table = await readTable(TRANSACTIONS_TABLE, filePath);
    const loaded = loadTransactions(table.rows);

    expect(loaded.ok).toBe(false);
    if (loaded.ok) return;
    expect(loaded.issues[0]).toMatchObject({ rowNumber: 2, column: 0, message: 'Row has 2 columns' });
  });
});
