/**
 * @forgeloop/history-store
 */

export {
  HistoryStore,
  type HistoryQuery,
  type SessionRecord,
} from './history-store.js';
