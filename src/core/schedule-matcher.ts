import { Cron } from 'croner';
import type { AppConfig, ScheduleConfig } from './config.js';
import { ScheduleNotFoundError } from './errors.js';
import type { LogSink } from '../utils/logger.js';

const MINUTE_MS = 60 * 1000;

/**
 * 截斷到整分鐘（UTC）
 */
export function truncateToMinute(date: Date): Date {
  return new Date(Math.floor(date.getTime() / MINUTE_MS) * MINUTE_MS);
}

/**
 * 判斷 cron 在 now 所在的這一分鐘是否該觸發
 *
 * 從 now 截斷後往前一分鐘開始找下一次觸發時間，若剛好落在 now 這一分鐘就算到期。
 * 這樣外部觸發器在該分鐘的任何一秒呼叫都會得到相同結果。
 * 無法解析的 cron 會丟出錯誤。
 */
export function isDue(cronExpression: string, now: Date): boolean {
  const nowTrunc = truncateToMinute(now);
  const base = new Date(nowTrunc.getTime() - MINUTE_MS);

  const next = new Cron(cronExpression, { timezone: 'UTC' }).nextRun(base);
  if (!next) {
    return false;
  }
  return truncateToMinute(next).getTime() === nowTrunc.getTime();
}

/**
 * 選出這次要執行的排程
 *
 * 指定 scheduleId 時不看 cron，直接回傳該排程（找不到則丟 ScheduleNotFoundError）；
 * 否則依宣告順序回傳 now 這一分鐘到期的排程。沒有 cron 的排程只能手動指定執行。
 */
export function selectSchedules(
  config: AppConfig,
  now: Date,
  scheduleId: string | undefined,
  logger: LogSink
): ScheduleConfig[] {
  if (scheduleId !== undefined) {
    const schedule = config.schedules.find((s) => s.id === scheduleId);
    if (!schedule) {
      throw new ScheduleNotFoundError(scheduleId);
    }
    return [schedule];
  }

  const due: ScheduleConfig[] = [];
  for (const schedule of config.schedules) {
    if (!schedule.cron) {
      continue;
    }

    try {
      if (isDue(schedule.cron, now)) {
        due.push(schedule);
      }
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      logger.warn(`cron parse/next failed for schedule ${schedule.id}: ${detail}`);
    }
  }
  return due;
}
