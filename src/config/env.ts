import dotenv from 'dotenv';

dotenv.config();

const required = ['TELEGRAM_BOT_TOKEN'] as const;

for (const key of required) {
  if (!process.env[key]) {
    throw new Error(`Missing required env var: ${key}`);
  }
}

type StateBackend = 'file' | 'supabase';

function readStateBackend(value: string | undefined): StateBackend {
  const backend = (value ?? 'file').trim().toLowerCase();
  if (backend === 'file' || backend === 'supabase') {
    return backend;
  }
  throw new Error(`Unsupported STATE_BACKEND: ${backend}`);
}

function readPositiveInt(value: string | undefined, fallback: number): number {
  const parsed = Number(value ?? fallback);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : fallback;
}

const stateBackend = readStateBackend(process.env.STATE_BACKEND);

if (stateBackend === 'supabase' && (!process.env.SUPABASE_URL || !process.env.SUPABASE_SERVICE_ROLE_KEY)) {
  throw new Error('STATE_BACKEND=supabase needs SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY');
}

export const env = {
  nodeEnv: process.env.NODE_ENV ?? 'development',
  port: Number(process.env.PORT ?? 3000),
  telegramBotToken: process.env.TELEGRAM_BOT_TOKEN ?? '',
  telegramWebhookSecret: process.env.TELEGRAM_WEBHOOK_SECRET,
  telegramWebhookToken: process.env.TELEGRAM_WEBHOOK_TOKEN,
  defaultTimezone: process.env.DEFAULT_TIMEZONE ?? 'Asia/Jakarta',
  defaultCity: process.env.DEFAULT_CITY ?? 'Bekasi',
  defaultCountry: process.env.DEFAULT_COUNTRY ?? 'ID',
  prayerCalcMethod: readPositiveInt(process.env.PRAYER_CALC_METHOD, 11),
  lookupTimeoutMs: readPositiveInt(process.env.LOOKUP_TIMEOUT_MS, 10_000),
  storeTimeoutMs: readPositiveInt(process.env.STORE_TIMEOUT_MS, 10_000),
  stateBackend,
  stateFile: process.env.STATE_FILE ?? 'prayer_data.json',
  supabaseUrl: process.env.SUPABASE_URL ?? '',
  supabaseServiceRoleKey: process.env.SUPABASE_SERVICE_ROLE_KEY ?? '',
  geocoderUserAgent: process.env.GEOCODER_USER_AGENT ?? 'worship-tracker-bot'
};
