import path from 'path';
import winston from 'winston';
import Transport from 'winston-transport';
import type { SupabaseClient } from '@supabase/supabase-js';
import { DEFAULT_CONFIG } from '../config/default';
import { getSupabaseClient } from '../db/supabase';

const CRITICAL_TAGS = ['[REBALANCE]', '[WITHDRAWAL]', '[EMERGENCY]', '[CIRCUIT]'];

class SupabaseCriticalTransport extends Transport {
  private client: SupabaseClient;

  constructor(opts: Transport.TransportStreamOptions & { supabaseClient: SupabaseClient }) {
    super(opts);
    this.client = opts.supabaseClient;
  }

  log(info: { level: string; message: unknown }, callback: () => void) {
    setImmediate(() => {
      this.emit('logged', info);
    });

    const level = info.level;
    const message = String(info.message);

    const isCritical =
      level === 'error' ||
      level === 'warn' ||
      CRITICAL_TAGS.some(tag => message.includes(tag));

    if (isCritical) {
      Promise.resolve(
        this.client.from('pool_logs').insert({
          level,
          message,
          env: DEFAULT_CONFIG.ENV,
          timestamp: new Date().toISOString()
        })
      ).then(({ error }) => {
        if (error) process.stderr.write(`[LOGGING] pool_logs insert failed: ${error.message}\n`);
      }, (err: unknown) => {
        process.stderr.write(`[LOGGING] pool_logs insert failed: ${String(err)}\n`);
      });
    }

    callback();
  }
}

const isTest = DEFAULT_CONFIG.ENV === 'test';

const transports: winston.transport[] = [
  new winston.transports.Console({
    silent: isTest && !DEFAULT_CONFIG.LOG_LEVEL,
    format: winston.format.combine(
      winston.format.colorize(),
      winston.format.simple()
    ),
  }),
];

if (DEFAULT_CONFIG.LOG_DIR) {
  transports.push(
    new winston.transports.File({ filename: path.join(DEFAULT_CONFIG.LOG_DIR, 'error.log'), level: 'error' }),
    new winston.transports.File({ filename: path.join(DEFAULT_CONFIG.LOG_DIR, 'combined.log') }),
  );
}

const supabase = isTest ? null : getSupabaseClient();
if (supabase) {
  transports.push(new SupabaseCriticalTransport({ supabaseClient: supabase }));
}

const logger = winston.createLogger({
  level: DEFAULT_CONFIG.LOG_LEVEL || 'info',
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.json()
  ),
  transports,
});

export default logger;
