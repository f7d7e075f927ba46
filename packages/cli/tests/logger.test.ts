import { describe, expect, it } from 'vitest';
import { Logger, redactPersonalData } from '../src/index.js';

function capture() {
  const lines: string[] = [];
  return { lines, sink: { write: (chunk: string) => lines.push(chunk) } };
}

describe('Logger', () => {
  it('drops messages below the configured level', () => {
    const { lines, sink } = capture();
    const logger = new Logger({ level: 'warn', sink });

    logger.info('hidden');
    logger.warn('shown');

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatch(/^\[\S+\] WARN shown\n$/);
  });

  it('writes JSON records with child fields', () => {
    const { lines, sink } = capture();
    const logger = new Logger({ format: 'json', sink }).child({ runId: 'run-1' });

    logger.info('Writing run directory', { outputsDir: '/tmp/out' });

    const record: unknown = JSON.parse(lines[0] ?? '');
    expect(record).toMatchObject({
      level: 'info',
      msg: 'Writing run directory',
      runId: 'run-1',
      outputsDir: '/tmp/out',
    });
  });

  it('shows the run id in text output', () => {
    const { lines, sink } = capture();

    new Logger({ sink }).child({ runId: 'run-1' }).error('failed');

    expect(lines[0]).toMatch(/^\[\S+\] ERROR run=run-1 failed\n$/);
  });
});

describe('redactPersonalData', () => {
  it('hides donor details at any depth', () => {
    expect(
      redactPersonalData({ rowNumber: 2, donor: { firstName: 'Jo' }, nested: { postcode: 'M1 1AE', ok: true } })
    ).toEqual({ rowNumber: 2, donor: '[REDACTED]', nested: { postcode: '[REDACTED]', ok: true } });
  });
});
