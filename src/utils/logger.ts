import winston from 'winston';
import Transport from 'winston-transport';
import { createClient, SupabaseClient } from '@supabase/supabase-js';

const SUPABASE_URL = process.env.SUPABASE_URL;
const SUPABASE_SERVICE_ROLE_KEY = process.env.SUPABASE_SERVICE_ROLE_KEY;
const IS_TEST = process.env.NODE_ENV === 'test';

let supabase: SupabaseClient | null = null;

if (SUPABASE_URL && SUPABASE_SERVICE_ROLE_KEY && !IS_TEST) {
  supabase = createClient(SUPABASE_URL, SUPABASE_SERVICE_ROLE_KEY);
}

const CRITICAL_TAGS = ['[EPISODE]', '[CONFIG]', '[FATAL]'];

class SupabaseCriticalTransport extends Transport {
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
    const message = String(info.message);

    const isCritical =
      level === 'error' ||
      level === 'warn' ||
      CRITICAL_TAGS.some((tag) => message.includes(tag));

    if (isCritical) {
      Promise.resolve(
        this.client.from('game_logs').insert({
          level,
          details: { message },
          timestamp: new Date().toISOString()
        })
      ).catch((err: unknown) => {
        process.stderr.write(`[LOGGING] game_logs insert failed: ${String(err)}\n`);
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

if (process.env.LOG_TO_FILE === 'true') {
  transports.push(
    new winston.transports.File({ filename: 'error.log', level: 'error' }),
    new winston.transports.File({ filename: 'combined.log' }),
  );
}

if (supabase) {
  transports.push(new SupabaseCriticalTransport({ supabaseClient: supabase }));
}

const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || (IS_TEST ? 'warn' : 'info'),
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.json()
  ),
  transports,
});

export default logger;
