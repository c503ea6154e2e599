/**
 * Configuration types.
 */

export interface TelegramSettings {
  readonly botToken: string | null;
  readonly chatId: string | null;
  readonly forceIPv4: boolean;
}

export interface DatabaseSettings {
  readonly dsn: string | null;
  readonly hostPort: string | null;
  readonly user: string | null;
  readonly password: string | null;
  readonly database: string | null;
}

export interface TimeoutSettings {
  /** Telegram API request timeout */
  readonly httpMs: number;
  /** PostgreSQL connect and query timeout */
  readonly dbMs: number;
}

export interface LoggingSettings {
  readonly dir: string;
  readonly fallbackDir: string;
  readonly retention: number;
}

/**
 * Everything a hook run needs, built once at process start.
 */
export interface HookConfig {
  readonly telegram: TelegramSettings;
  readonly database: DatabaseSettings;
  readonly projectDir: string | null;
  readonly sessionId: string | null;
  readonly fallbackFile: string;
  readonly timeouts: TimeoutSettings;
  readonly logging: LoggingSettings;
}
