import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest';
import { join } from 'path';
import { mkdtemp, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { Runner, previewBody } from '../src/core/runner.js';
import { Registry } from '../src/core/registry.js';
import { ConfigNotFoundError, UnregisteredIdentifierError } from '../src/core/errors.js';
import type { ContentPlugin, PluginContext, PushMessage } from '../src/core/models.js';
import type { NotificationChannel } from '../src/core/notification/types.js';
import { createSinkMock, writeConfig } from './helpers.js';

const CONFIG = `
recipients:
  alice:
    channel:
      type: fake
      token: test-secret-alice
  bob:
    channel:
      type: fake
  carol:
    channel:
      type: carrier-pigeon
plugin_configs:
  brief:
    symbols: [A, B]
global_config:
  timezone: UTC
schedules:
  - id: isolation
    jobs:
      - recipient_id: alice
        plugin_id: boom
        config_ref: brief
      - recipient_id: bob
        plugin_id: hello
        config_ref: brief
  - id: stamping
    jobs:
      - recipient_id: bob
        plugin_id: multi
        config_ref: brief
  - id: pigeon
    jobs:
      - recipient_id: carol
        plugin_id: hello
        config_ref: brief
      - recipient_id: bob
        plugin_id: hello
        config_ref: brief
  - id: every-five
    cron: "*/5 * * * *"
    jobs:
      - recipient_id: bob
        plugin_id: hello
        config_ref: brief
  - id: noon
    cron: "0 12 * * *"
    jobs:
      - recipient_id: alice
        plugin_id: hello
        config_ref: brief
`;

const hello: PushMessage = {
  title: 'Hi',
  body: 'line1\nline2',
  format: 'text',
  targetRecipient: null,
};

function fakePlugin(id: string, run: (ctx: PluginContext) => Promise<PushMessage[]>) {
  return { id, run: vi.fn(run) };
}

describe('Runner', () => {
  let tempDir: string;
  let configPath: string;
  let logger: ReturnType<typeof createSinkMock>;
  let channel: { type: string; send: Mock<NotificationChannel['send']> };
  let helloPlugin: ReturnType<typeof fakePlugin>;
  let multiPlugin: ReturnType<typeof fakePlugin>;
  let boomPlugin: ReturnType<typeof fakePlugin>;
  let runner: Runner;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'runner-test-'));
    configPath = await writeConfig(tempDir, CONFIG);
    logger = createSinkMock();
    channel = { type: 'fake', send: vi.fn<NotificationChannel['send']>().mockResolvedValue(undefined) };

    helloPlugin = fakePlugin('hello', async () => [hello]);
    multiPlugin = fakePlugin('multi', async () => [
      { title: 'For job recipient', body: 'a', format: 'text', targetRecipient: null },
      { title: 'For Alice', body: 'b', format: 'text', targetRecipient: 'alice' },
      { title: 'For nobody', body: 'c', format: 'text', targetRecipient: 'zed' },
    ]);
    boomPlugin = fakePlugin('boom', async () => {
      throw new Error('upstream exploded');
    });

    const plugins = new Registry<ContentPlugin>('plugin')
      .register('hello', () => helloPlugin)
      .register('multi', () => multiPlugin)
      .register('boom', () => boomPlugin);
    const channels = new Registry<NotificationChannel>('channel type').register('fake', () => channel);

    runner = new Runner({ plugins, channels, logger });
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('單一 job 失敗不影響其他 job', async () => {
    const summary = await runner.run({ configPath, scheduleId: 'isolation' });

    expect(summary).toEqual({
      schedules: ['isolation'],
      jobsSucceeded: 1,
      jobsFailed: 1,
      messagesDispatched: 1,
      messagesPreviewed: 0,
      messagesDropped: 0,
    });
    expect(logger.error).toHaveBeenCalledWith(
      'job failed schedule=isolation recipient=alice plugin=boom:',
      expect.objectContaining({ message: 'upstream exploded' })
    );
    expect(channel.send).toHaveBeenCalledTimes(1);
    expect(channel.send).toHaveBeenCalledWith({ ...hello, targetRecipient: 'bob' }, { type: 'fake' });
  });

  it('should pass a read-only context to plugins', async () => {
    const now = new Date('2024-01-01T08:00:00Z');
    await runner.run({ configPath, scheduleId: 'stamping', now });

    expect(multiPlugin.run).toHaveBeenCalledWith({
      now,
      recipientId: 'bob',
      pluginConfig: { symbols: ['A', 'B'] },
      globalConfig: { timezone: 'UTC' },
    });
  });

  it('補上 job 收件者、保留 plugin 指定的收件者、丟棄未知收件者', async () => {
    const summary = await runner.run({ configPath, scheduleId: 'stamping' });

    expect(channel.send).toHaveBeenCalledTimes(2);
    expect(channel.send).toHaveBeenNthCalledWith(
      1,
      expect.objectContaining({ title: 'For job recipient', targetRecipient: 'bob' }),
      { type: 'fake' }
    );
    expect(channel.send).toHaveBeenNthCalledWith(
      2,
      expect.objectContaining({ title: 'For Alice', targetRecipient: 'alice' }),
      { type: 'fake', token: 'test-secret-alice' }
    );
    expect(logger.warn).toHaveBeenCalledWith("message target_recipient 'zed' not in recipients, skip");
    expect(summary.messagesDispatched).toBe(2);
    expect(summary.messagesDropped).toBe(1);
    expect(summary.jobsSucceeded).toBe(1);
  });

  it('should not mutate the messages a plugin returns', async () => {
    await runner.run({ configPath, scheduleId: 'isolation' });
    expect(hello.targetRecipient).toBeNull();
  });

  it('dry-run 執行 plugin 但不呼叫 send', async () => {
    const summary = await runner.run({ configPath, scheduleId: 'isolation', dryRun: true });

    expect(channel.send).not.toHaveBeenCalled();
    expect(helloPlugin.run).toHaveBeenCalledTimes(1);
    expect(boomPlugin.run).toHaveBeenCalledTimes(1);
    expect(summary.messagesPreviewed).toBe(1);
    expect(summary.messagesDispatched).toBe(0);
    expect(logger.info).toHaveBeenCalledWith(
      'Dry-run mode enabled: will execute plugins but not send any messages to channels.'
    );
    expect(logger.info).toHaveBeenCalledWith(
      `Dry-run: would send to recipient='bob' via channel='fake' title="Hi" preview="line1 line2"`
    );
  });

  it('未註冊的 channel type 讓該 job 失敗', async () => {
    const summary = await runner.run({ configPath, scheduleId: 'pigeon' });

    expect(summary.jobsFailed).toBe(1);
    expect(summary.jobsSucceeded).toBe(1);
    expect(logger.error).toHaveBeenCalledWith(
      'job failed schedule=pigeon recipient=carol plugin=hello:',
      expect.any(UnregisteredIdentifierError)
    );
    expect(channel.send).toHaveBeenCalledTimes(1);
  });

  it('should run only the schedules due this minute', async () => {
    const summary = await runner.run({ configPath, now: new Date('2024-01-01T00:05:42Z') });

    expect(summary.schedules).toEqual(['every-five']);
    expect(logger.info).toHaveBeenCalledWith('Running 1 schedule(s): every-five');
    expect(channel.send).toHaveBeenCalledTimes(1);
  });

  it('沒有到期排程時回傳空的 summary', async () => {
    const summary = await runner.run({ configPath, now: new Date('2024-01-01T00:06:00Z') });

    expect(summary).toEqual({
      schedules: [],
      jobsSucceeded: 0,
      jobsFailed: 0,
      messagesDispatched: 0,
      messagesPreviewed: 0,
      messagesDropped: 0,
    });
    expect(logger.info).toHaveBeenCalledWith(
      'No schedules to run (current time does not match any cron). Use --schedule <id> to run a schedule anyway.'
    );
    expect(helloPlugin.run).not.toHaveBeenCalled();
  });

  it('should use the injected clock when no time is given', async () => {
    const clocked = new Runner({
      plugins: new Registry<ContentPlugin>('plugin')
        .register('hello', () => helloPlugin)
        .register('multi', () => multiPlugin)
        .register('boom', () => boomPlugin),
      channels: new Registry<NotificationChannel>('channel type').register('fake', () => channel),
      logger,
      clock: () => new Date('2024-01-01T12:00:00Z'),
    });

    const summary = await clocked.run({ configPath });
    expect(summary.schedules).toEqual(['every-five', 'noon']);
  });

  it('should fail before running anything when the config is missing', async () => {
    await expect(runner.run({ configPath: join(tempDir, 'missing.yaml') })).rejects.toThrow(
      ConfigNotFoundError
    );
    expect(helloPlugin.run).not.toHaveBeenCalled();
  });
});

describe('previewBody', () => {
  it('should truncate to 200 characters and flatten newlines', () => {
    expect(previewBody('a\nb')).toBe('a b');
    expect(previewBody('x'.repeat(250))).toHaveLength(200);
  });

  it('不切開代理對', () => {
    const body = `${'x'.repeat(199)}😀tail`;

    expect(previewBody(body)).toBe(`${'x'.repeat(199)}😀`);
  });
});
