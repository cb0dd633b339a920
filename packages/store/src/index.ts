export { LedgerLog } from "./ledger-log.js";
export type { LedgerLogOptions, LedgerRecord } from "./ledger-log.js";
export { TeamStore, safeFileName, SNAPSHOT_FILE, LEDGER_FILE, CAPABILITIES_DIR } from "./team-store.js";
export type { TeamStoreOptions } from "./team-store.js";
export { MemoryTeamStore } from "./memory-store.js";
export { writeFileAtomic, writeJsonAtomic } from "./atomic-file.js";
export type { AtomicWriteOptions } from "./atomic-file.js";
