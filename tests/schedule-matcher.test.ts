import { describe, it, expect } from 'vitest';
import { isDue, selectSchedules, truncateToMinute } from '../src/core/schedule-matcher.js';
import { ScheduleNotFoundError } from '../src/core/errors.js';
import type { AppConfig, ScheduleConfig } from '../src/core/config.js';
import { createSinkMock } from './helpers.js';

function schedule(id: string, cron?: string): ScheduleConfig {
  return { id, cron, jobs: [] };
}

function configWith(schedules: ScheduleConfig[]): AppConfig {
  return {
    recipients: { alice: { channel: {} } },
    schedules,
    pluginConfigs: {},
    globalConfig: {},
  };
}

describe('truncateToMinute', () => {
  it('should drop seconds and milliseconds', () => {
    expect(truncateToMinute(new Date('2024-01-01T00:05:59.999Z')).toISOString()).toBe(
      '2024-01-01T00:05:00.000Z'
    );
  });
});

describe('isDue', () => {
  it('整分鐘內任何一秒都算到期', () => {
    expect(isDue('*/5 * * * *', new Date('2024-01-01T00:05:00Z'))).toBe(true);
    expect(isDue('*/5 * * * *', new Date('2024-01-01T00:05:30Z'))).toBe(true);
    expect(isDue('*/5 * * * *', new Date('2024-01-01T00:05:59.999Z'))).toBe(true);
  });

  it('下一分鐘不再到期', () => {
    expect(isDue('*/5 * * * *', new Date('2024-01-01T00:06:00Z'))).toBe(false);
    expect(isDue('*/5 * * * *', new Date('2024-01-01T00:04:59Z'))).toBe(false);
  });

  it('should evaluate cron in UTC', () => {
    expect(isDue('30 1 * * *', new Date('2024-01-01T01:30:10Z'))).toBe(true);
    expect(isDue('30 1 * * *', new Date('2024-01-01T09:30:10Z'))).toBe(false);
  });

  it('should throw for an invalid expression', () => {
    expect(() => isDue('not a cron', new Date('2024-01-01T00:00:00Z'))).toThrow();
  });
});

describe('selectSchedules', () => {
  const now = new Date('2024-01-01T00:05:30Z');

  it('依宣告順序回傳到期排程，略過沒有 cron 的排程', () => {
    const logger = createSinkMock();
    const config = configWith([
      schedule('every-minute', '* * * * *'),
      schedule('manual'),
      schedule('hourly', '0 * * * *'),
      schedule('five', '*/5 * * * *'),
    ]);

    const selected = selectSchedules(config, now, undefined, logger);

    expect(selected.map((s) => s.id)).toEqual(['every-minute', 'five']);
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it('無法解析的 cron 記 warning 並排除', () => {
    const logger = createSinkMock();
    const config = configWith([schedule('broken', 'every day'), schedule('five', '*/5 * * * *')]);

    const selected = selectSchedules(config, now, undefined, logger);

    expect(selected.map((s) => s.id)).toEqual(['five']);
    expect(logger.warn).toHaveBeenCalledTimes(1);
    expect(logger.warn).toHaveBeenCalledWith(
      expect.stringContaining('cron parse/next failed for schedule broken:')
    );
  });

  it('指定 id 時忽略 cron', () => {
    const logger = createSinkMock();
    const config = configWith([schedule('five', '*/5 * * * *'), schedule('manual')]);

    expect(selectSchedules(config, now, 'manual', logger).map((s) => s.id)).toEqual(['manual']);
    expect(
      selectSchedules(config, new Date('2024-01-01T00:06:00Z'), 'five', logger).map((s) => s.id)
    ).toEqual(['five']);
  });

  it('should throw ScheduleNotFoundError for an unknown id', () => {
    const config = configWith([schedule('five', '*/5 * * * *')]);
    expect(() => selectSchedules(config, now, 'ghost', createSinkMock())).toThrow(ScheduleNotFoundError);
    expect(() => selectSchedules(config, now, 'ghost', createSinkMock())).toThrow(
      "schedule id 'ghost' not found in config"
    );
  });
});
