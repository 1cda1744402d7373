export { AtomicStorage } from './atomic-storage';
export type { ChecksummedFile, Guard, ReadResult } from './atomic-storage';
