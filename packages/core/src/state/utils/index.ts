export {
  atomicWriteFile,
  atomicWriteJson,
  getTempFilePath,
  type AtomicWriteOptions,
} from "./atomic.js";

export {
  safeReadJson,
  SafeReadError,
  type SafeReadResult,
  type SafeReadOptions,
} from "./reads.js";

export {
  acquireFileLock,
  withFileLock,
  getLockPath,
  type FileLockOptions,
} from "./lock.js";
