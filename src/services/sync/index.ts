// Sync Services - Re-exports
export {
  ZoneSyncService,
  type ZoneStatus,
  type ZoneSyncResult,
} from "./zone-sync.js";
export {
  SyncOrchestrator,
  selectZones,
  type OrchestratorOptions,
  type SelectionOptions,
  type SyncProgress,
  type SyncRunResult,
  type ZoneOutcome,
  type ZoneSelection,
} from "./orchestrator.js";
export {
  findZoneFile,
  parseSoaSerial,
  parseZoneLine,
  readZoneRecords,
  zoneKeyFromUrl,
  type ParsedRecord,
} from "./zone-file.js";
