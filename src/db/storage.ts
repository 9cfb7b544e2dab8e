/**
 * PostgreSQL-backed storage for the sync engine
 */

import type { SyncStorage } from '../types/storage.js';
import {
  adjustSourcePriority,
  appendRunRecord,
  getLastRunRecords,
  getParsingState,
  getSourceById,
  hasFingerprint,
  insertContentItem,
  listActiveSources,
  recordSourceFailure,
  recordSourceSuccess,
  upsertParsingState,
  upsertSource,
} from './queries.js';

export const pgStorage: SyncStorage = {
  listActiveSources,
  getSourceById,
  recordSourceSuccess,
  recordSourceFailure,
  adjustSourcePriority,
  upsertSource,
  insertContentItem,
  hasFingerprint,
  getParsingState,
  upsertParsingState,
  appendRunRecord,
  getLastRunRecords,
};
