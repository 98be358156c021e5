// pattern: Imperative Shell

import { describe, it, expect } from 'vitest';
import { componentLogger, createLogger } from './logger.ts';

function capture(): { lines: Array<Record<string, unknown>>; stream: { write(msg: string): void } } {
  const lines: Array<Record<string, unknown>> = [];
  return {
    lines,
    stream: {
      write(msg: string): void {
        lines.push(JSON.parse(msg));
      },
    },
  };
}

describe('createLogger', () => {
  it('redacts credential values at the top level and one level down', () => {
    const { lines, stream } = capture();
    const logger = createLogger({ level: 'info' }, stream);

    logger.info(
      { value: 'test-secret', credential: { name: 'VAULT_TOKEN', value: 'test-secret' }, api_key: 'test-key' },
      'credential resolved',
    );

    expect(lines[0]?.['value']).toBe('[redacted]');
    expect(lines[0]?.['credential']).toEqual({ name: 'VAULT_TOKEN', value: '[redacted]' });
    expect(lines[0]?.['api_key']).toBe('[redacted]');
    expect(lines[0]?.['msg']).toBe('credential resolved');
  });

  it('redacts auth headers and tags component children', () => {
    const { lines, stream } = capture();
    const log = componentLogger('vault', createLogger({ level: 'debug' }, stream));

    log.debug({ headers: { 'X-Vault-Token': 'test-secret', accept: 'application/json' } }, 'sending');

    expect(lines[0]?.['component']).toBe('vault');
    expect(lines[0]?.['headers']).toEqual({ 'X-Vault-Token': '[redacted]', accept: 'application/json' });
  });
});
