import { AppConfig } from '../config/env';
import { logger } from '../utils/logger';
import { createMemoryStore } from './memoryStore';
import { createSupabaseClient, createSupabaseStore } from './supabaseStore';
import { DataStore } from './types';

export * from './types';
export { createMemoryStore } from './memoryStore';
export { createSupabaseStore } from './supabaseStore';

/**
 * Create the data store selected by configuration
 */
export const createDataStore = (config: AppConfig): DataStore => {
  if (config.dataStore === 'supabase' && config.supabase) {
    logger.info('Using Supabase data store', { url: config.supabase.url });
    return createSupabaseStore(createSupabaseClient(config.supabase));
  }

  if (config.isProduction) {
    logger.warn('Using in-memory data store in production; data is lost on restart');
  } else {
    logger.info('Using in-memory data store');
  }
  return createMemoryStore();
};
