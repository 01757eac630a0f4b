import express, { Request, Response } from 'express';
import { env } from './config/env';
import { TelegramWebhookController } from './controllers/TelegramWebhookController';
import { ChecklistManager } from './prayer/checklist';
import { PrayerHandlers } from './prayer/handlers';
import { PrayerTimesService } from './prayer/prayerTimesService';
import { ReadingHandlers } from './reading/handlers';
import { SelectionFlow } from './reading/selectionFlow';
import { FileStateStore } from './repos/FileStateStore';
import type { StateStore } from './repos/StateStore';
import { SupabaseStateStore } from './repos/SupabaseStateStore';
import { UserRecordRepo } from './repos/UserRecordRepo';
import { ReminderNotifier } from './scheduler/ReminderNotifier';
import { ReminderScheduler } from './scheduler/ReminderScheduler';
import { nodeTimerDriver } from './scheduler/timerDriver';
import { ContentComposer } from './services/ContentComposer';
import { TelegramApi } from './services/TelegramApi';
import { createSupabaseClient } from './supabase/client';
import type { WorshipSettings } from './types/domain';
import { isTelegramUpdate } from './types/telegram';
import { errorMessage } from './utils/errors';
import { logger } from './utils/logger';

function createStateStore(): StateStore {
  if (env.stateBackend === 'supabase') {
    return new SupabaseStateStore(createSupabaseClient(env.supabaseUrl, env.supabaseServiceRoleKey));
  }
  return new FileStateStore(env.stateFile);
}

const settings: WorshipSettings = {
  timezone: env.defaultTimezone,
  defaultCity: env.defaultCity,
  defaultCountry: env.defaultCountry
};

const app = express();
app.use(express.json({ limit: '1mb' }));

const repo = new UserRecordRepo(createStateStore(), env.storeTimeoutMs);
const telegramApi = new TelegramApi(env.telegramBotToken);
const composer = new ContentComposer(settings.timezone);
const timeSource = new PrayerTimesService({
  timezone: settings.timezone,
  method: env.prayerCalcMethod,
  timeoutMs: env.lookupTimeoutMs,
  userAgent: env.geocoderUserAgent
});
const notifier = new ReminderNotifier(telegramApi, repo, composer);
const scheduler = new ReminderScheduler(nodeTimerDriver, settings, notifier.handle);

const prayerHandlers = new PrayerHandlers(
  telegramApi,
  repo,
  timeSource,
  new ChecklistManager(),
  scheduler,
  composer,
  settings
);
const readingHandlers = new ReadingHandlers(telegramApi, repo, new SelectionFlow(repo), scheduler, composer);

const telegramController = new TelegramWebhookController(telegramApi, composer, prayerHandlers, readingHandlers);

app.get('/health', (_req: Request, res: Response) => {
  res.status(200).json({
    ok: true,
    ts: new Date().toISOString(),
    liveTimers: scheduler.liveTimers().length
  });
});

app.post(['/telegram/webhook', '/telegram/webhook/:secret'], (req: Request, res: Response) => {
  const secretFromPath = req.params.secret;
  const secretFromHeader = req.header('x-telegram-bot-api-secret-token');

  if (env.telegramWebhookSecret && secretFromPath !== env.telegramWebhookSecret) {
    res.status(403).json({ ok: false, error: 'Invalid webhook path secret' });
    return;
  }

  if (env.telegramWebhookToken && secretFromHeader !== env.telegramWebhookToken) {
    res.status(403).json({ ok: false, error: 'Invalid webhook token' });
    return;
  }

  const update: unknown = req.body;
  if (!isTelegramUpdate(update)) {
    res.status(400).json({ ok: false, error: 'Invalid update payload' });
    return;
  }

  res.status(200).json({ ok: true });

  telegramController.handle(update).catch((error: unknown) => {
    logger.error('Async webhook processing failed', {
      error: errorMessage(error),
      updateId: update.update_id
    });
  });
});

async function restoreReminders(): Promise<void> {
  try {
    const records = await repo.list();
    scheduler.restoreReadingReminders(records);
  } catch (error) {
    logger.error('Reminder recovery failed', { error: errorMessage(error) });
  }
}

const server = app.listen(env.port, () => {
  logger.info('Server started', {
    port: env.port,
    mode: env.nodeEnv,
    timezone: settings.timezone,
    stateBackend: env.stateBackend
  });
  void restoreReminders();
});

function shutdown(signal: string): void {
  logger.info('Shutting down', { signal });
  scheduler.stopAll();
  server.close(() => process.exit(0));
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
