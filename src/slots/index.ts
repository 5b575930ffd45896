/**
 * Handler slot and buffer exports.
 */

export { HandlerSlot } from './HandlerSlot.ts';
export type { Handler, BufferSink, InstallOutcome } from './HandlerSlot.ts';
export { PendingQueue } from './PendingQueue.ts';
export { ErrorLatch } from './ErrorLatch.ts';
