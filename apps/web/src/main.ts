import { StatusSynchronizer } from "./status/StatusSynchronizer";

export { StatusSynchronizer } from "./status/StatusSynchronizer";
export type { StatusSynchronizerOptions } from "./status/StatusSynchronizer";
export type { StatusSyncEvent } from "./status/events";
export type { AppointmentStatus } from "./status/contract";

// One delegated listener covers every control, including ones added after load.
export const statusSync = new StatusSynchronizer();
statusSync.install();
