/**
 * CLI command tests
 */

import { createForwardCommand, type ForwardCommandOptions } from '../cli/commands/forward.js';
import { collectStatus, formatStatus } from '../cli/commands/status.js';
import { encodeRequest } from '../codec/index.js';
import { ExchangeStore } from '../store/exchange-store.js';
import { createTempStore } from './helpers.js';

async function parseForward(argv: string[]): Promise<ForwardCommandOptions> {
  let captured: ForwardCommandOptions | undefined;
  const command = createForwardCommand(async options => {
    captured = options;
  });
  command.exitOverride().configureOutput({ writeErr: () => undefined });

  await command.parseAsync(argv, { from: 'user' });
  if (!captured) throw new Error('forward action did not run');
  return captured;
}

describe('forward command', () => {
  it('collects repeated --block-domain flags', async () => {
    expect(
      await parseForward(['--shared-dir', '/srv/relay', '--block-domain', 'a.test', '--block-domain', 'b.test', '-v']),
    ).toEqual({ sharedDir: '/srv/relay', blockDomain: ['a.test', 'b.test'], verbose: true });
  });

  it('defaults to no extra blocked domains', async () => {
    expect(await parseForward(['-c', 'ferry.yaml'])).toEqual({ config: 'ferry.yaml', blockDomain: [] });
  });

  it('rejects unknown flags', async () => {
    await expect(parseForward(['--bogus'])).rejects.toThrow("unknown option '--bogus'");
  });
});

describe('status report', () => {
  let dir: string;
  let store: ExchangeStore;
  let cleanup: () => void;

  beforeEach(async () => {
    ({ dir, store, cleanup } = createTempStore());
    await store.init();
  });

  afterEach(() => cleanup());

  it('counts pending exchanges', async () => {
    const { bytes } = encodeRequest({ method: 'GET', url: 'http://a.test/', headers: {}, body: Buffer.alloc(0) }, { id: 's1' });
    await store.publish('requests', 's1', bytes);

    const report = await collectStatus(store);

    expect(report).toEqual({
      sharedDir: dir,
      exists: true,
      requestsDir: `${dir}/requests`,
      responsesDir: `${dir}/responses`,
      pendingRequests: 1,
      pendingResponses: 0,
    });
    expect(formatStatus(report).slice(4)).toEqual([
      `Request directory: ${dir}/requests`,
      '  Pending requests: 1',
      `Response directory: ${dir}/responses`,
      '  Pending responses: 0',
    ]);
  });

  it('explains a missing shared directory', async () => {
    const report = await collectStatus(new ExchangeStore(`${dir}/absent`));

    expect(report.exists).toBe(false);
    expect(report.pendingRequests).toBe(0);
    expect(formatStatus(report).at(-1)).toBe(
      'Shared directory does not exist. Start the capture point or the forwarder to create it.',
    );
  });
});
