/**
 * Test utilities for the daemon: a fake CLI child process, stream-json line
 * builders and a recording ProcessRunner.
 */

export {
  assistantText,
  FakeChild,
  successResult,
  systemInit,
  toolUse,
} from './fake-child.js';
export { FakeRunner, type RecordedStart } from './fake-runner.js';
