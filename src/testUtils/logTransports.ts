import type { LogRecord, LogTransport } from '../logging/types.js';

// Captures records in place of console
export class MockTransport implements LogTransport {
  public logs: LogRecord[] = [];
  public errors: LogRecord[] = [];

  log(record: LogRecord) {
    this.logs.push(record);
  }

  error(record: LogRecord) {
    this.errors.push(record);
  }
}
