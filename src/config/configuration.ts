export interface TelegramConfig {
  botToken: string;
  adminUserIds: number[];
}

export interface MongoConfig {
  uri: string;
  database: string;
}

export interface GoogleConfig {
  serviceAccountFile: string;
  driveFolderId: string;
  sheetsId: string;
  sheetsName: string;
  oauthClientSecretFile: string;
  oauthTokenFile: string;
}

export interface MetaConfig {
  accessToken: string;
  facebookPageId: string;
  instagramAccountId: string;
}

export interface WhatsAppConfig {
  phoneNumberId: string;
  accessToken: string;
  otpTemplate: string;
}

export interface SchedulerConfig {
  checkIntervalMinutes: number;
  timezone: string;
}

export interface HttpConfig {
  port: number;
  adminApiKey: string;
}

export interface AppConfig {
  telegram: TelegramConfig;
  mongodb: MongoConfig;
  google: GoogleConfig;
  meta: MetaConfig;
  whatsapp: WhatsAppConfig;
  scheduler: SchedulerConfig;
  http: HttpConfig;
}

type Env = Record<string, string | undefined>;

export function parseAdminIds(value: string | undefined): number[] {
  return (value ?? '')
    .split(',')
    .map(part => part.trim())
    .filter(part => /^\d+$/.test(part))
    .map(Number);
}

function positiveInt(value: string | undefined, fallback: number): number {
  const parsed = Number.parseInt(value ?? '', 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

export function buildConfig(env: Env): AppConfig {
  return {
    telegram: {
      botToken: env.TELEGRAM_BOT_TOKEN ?? '',
      adminUserIds: parseAdminIds(env.ADMIN_USER_IDS),
    },
    mongodb: {
      uri: env.MONGODB_URI ?? '',
      database: env.MONGODB_DATABASE || 'training_center',
    },
    google: {
      serviceAccountFile: env.GOOGLE_SERVICE_ACCOUNT_FILE || 'credentials.json',
      driveFolderId: env.GOOGLE_DRIVE_FOLDER_ID ?? '',
      sheetsId: env.GOOGLE_SHEETS_ID ?? '',
      sheetsName: env.GOOGLE_SHEETS_NAME || 'Sheet1',
      oauthClientSecretFile: env.GOOGLE_OAUTH_CLIENT_SECRET || 'client_secret.json',
      oauthTokenFile: env.GOOGLE_OAUTH_TOKEN || 'token.json',
    },
    meta: {
      accessToken: env.META_ACCESS_TOKEN ?? '',
      facebookPageId: env.FACEBOOK_PAGE_ID ?? '',
      instagramAccountId: env.INSTAGRAM_ACCOUNT_ID ?? '',
    },
    whatsapp: {
      phoneNumberId: env.WHATSAPP_PHONE_NUMBER_ID ?? '',
      accessToken: env.WHATSAPP_ACCESS_TOKEN ?? '',
      otpTemplate: env.WHATSAPP_OTP_TEMPLATE || 'otp_verification',
    },
    scheduler: {
      checkIntervalMinutes: positiveInt(env.POST_CHECK_INTERVAL_MINUTES, 5),
      timezone: env.TIMEZONE || 'Asia/Damascus',
    },
    http: {
      port: positiveInt(env.PORT, 3000),
      adminApiKey: env.ADMIN_API_KEY ?? '',
    },
  };
}

/**
 * Fails startup when the bot cannot run at all. Everything else
 * (Google, Meta, WhatsApp) degrades to a logged error at call time.
 */
export function validateEnv(env: Env): Env {
  const missing = ['TELEGRAM_BOT_TOKEN', 'MONGODB_URI'].filter(key => !env[key]);
  if (missing.length > 0) {
    throw new Error(`Missing required environment variables: ${missing.join(', ')}`);
  }
  return env;
}

export default (): AppConfig => buildConfig(process.env);
