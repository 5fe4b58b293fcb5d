import winston from 'winston';
import Transport from 'winston-transport';
import { createClient, SupabaseClient } from '@supabase/supabase-js';
import { DEFAULT_CONFIG } from '../config/default';
import { TABLES } from '../config/constants';

const IS_TEST = process.env.NODE_ENV === 'test';

const CRITICAL_TAGS = ['DEPOSIT', 'WITHDRAW', 'DEPLOY', 'RETURN', 'VALUATION', 'SWEEP', 'PAUSE'];

let supabase: SupabaseClient | null = null;

if (!IS_TEST && DEFAULT_CONFIG.SUPABASE_URL && DEFAULT_CONFIG.SUPABASE_KEY) {
  supabase = createClient(DEFAULT_CONFIG.SUPABASE_URL, DEFAULT_CONFIG.SUPABASE_KEY);
  console.log('[LOGGING] Critical logging to Supabase enabled');
} else if (!IS_TEST) {
  console.log('[LOGGING] Supabase logging disabled – missing service role key');
}

/**
 * Mirrors warnings, errors and vault movement records to the vault_logs table.
 */
export class SupabaseCriticalTransport extends Transport {
  private client: SupabaseClient;

  constructor(opts: Transport.TransportStreamOptions & { supabaseClient: SupabaseClient }) {
    super(opts);
    this.client = opts.supabaseClient;
  }

  log(info: { level: string; message: string }, callback: () => void) {
    setImmediate(() => {
      this.emit('logged', info);
    });

    const level = info.level;
    const message = info.message;

    const isCritical =
      level === 'error' ||
      level === 'warn' ||
      CRITICAL_TAGS.some(tag => message.includes(tag));

    if (isCritical) {
      Promise.resolve(
        this.client.from(TABLES.LOGS).insert({
          action: level,
          details: { message },
          timestamp: new Date().toISOString()
        })
      ).catch((err: unknown) => {
        // the logger cannot log its own sink failure
        console.error('[LOGGING] Supabase log insert failed', err);
      });
    }

    callback();
  }
}

const transports: winston.transport[] = [
  new winston.transports.Console({
    format: winston.format.combine(
      winston.format.colorize(),
      winston.format.simple()
    ),
  }),
];

if (!IS_TEST) {
  transports.push(new winston.transports.File({ filename: 'error.log', level: 'error' }));
  transports.push(new winston.transports.File({ filename: 'combined.log' }));
}

if (supabase) {
  transports.push(new SupabaseCriticalTransport({ supabaseClient: supabase }));
}

const logger = winston.createLogger({
  level: DEFAULT_CONFIG.LOG_LEVEL,
  silent: IS_TEST,
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.json()
  ),
  transports,
});

export default logger;
