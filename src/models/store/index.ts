import type { StoreConfig } from '../../config';
import { createSupabaseClient } from '../../services/database/supabase';
import type { BotStore } from './BotStore';
import { InMemoryBotStore } from './InMemoryBotStore';
import { SupabaseBotStore } from './SupabaseBotStore';

export type { BotStore } from './BotStore';
export { InMemoryBotStore } from './InMemoryBotStore';
export { SupabaseBotStore } from './SupabaseBotStore';

export function createStore(config: StoreConfig): BotStore {
  switch (config.driver) {
    case 'supabase':
      return new SupabaseBotStore(createSupabaseClient(config.url, config.serviceRoleKey));
    case 'memory':
      return new InMemoryBotStore();
  }
}
