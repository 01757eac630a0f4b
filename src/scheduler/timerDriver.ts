import cron from 'node-cron';
import { dailyCronExpression, type ClockTime } from '../utils/time';

export type CancelTimer = () => void;

export interface TimerDriver {
  once(at: Date, fire: () => void): CancelTimer;
  daily(clock: ClockTime, timezoneName: string, fire: () => void): CancelTimer;
}

// Node caps a single setTimeout delay at 2^31-1 ms (~24.8 days).
const MAX_SET_TIMEOUT_MS = 2_147_483_647;

function scheduleOnce(at: Date, fire: () => void): CancelTimer {
  const targetTime = at.getTime();
  let cancelled = false;
  let timer: NodeJS.Timeout | undefined;

  const arm = () => {
    const remaining = targetTime - Date.now();
    const delay = Math.max(Math.min(remaining, MAX_SET_TIMEOUT_MS), 0);
    timer = setTimeout(() => {
      if (cancelled) {
        return;
      }
      if (remaining > MAX_SET_TIMEOUT_MS) {
        arm();
        return;
      }
      fire();
    }, delay);
    timer.unref();
  };

  arm();

  return () => {
    cancelled = true;
    clearTimeout(timer);
  };
}

function scheduleDaily(clock: ClockTime, timezoneName: string, fire: () => void): CancelTimer {
  const task = cron.schedule(dailyCronExpression(clock), () => fire(), { timezone: timezoneName });
  return () => {
    task.stop();
  };
}

export const nodeTimerDriver: TimerDriver = {
  once: scheduleOnce,
  daily: scheduleDaily
};
