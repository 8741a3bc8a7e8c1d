import * as fs from 'fs';
import * as path from 'path';

export interface HttpLogEntry {
  ts: string;
  event?: string;
  ip?: string;
  method?: string;
  path?: string;
  bytes?: number;
  durMs?: number;
  status?: number;
  error?: string;
}

/**
 * Append-only JSONL log, one entry per line. A stream error disables the
 * log and is reported on the console; writes never throw into callers.
 */
export class JsonlLog {
  private stream: fs.WriteStream | null = null;

  constructor(readonly logPath: string) {
    try {
      fs.mkdirSync(path.dirname(logPath), { recursive: true });
      this.stream = fs.createWriteStream(logPath, { flags: 'a' });
      this.stream.on('error', (err) => {
        console.error(`[HTTP] Log stream error: ${err.message}`);
        this.stream = null;
      });
      console.log(`[HTTP] JSONL logging enabled: ${logPath}`);
    } catch (e: unknown) {
      console.error(`[HTTP] Failed to initialize log stream: ${e instanceof Error ? e.message : String(e)}`);
    }
  }

  get enabled(): boolean {
    return this.stream !== null;
  }

  write(entry: HttpLogEntry) {
    if (!this.stream) return;
    this.stream.write(JSON.stringify(entry) + '\n');
  }

  close(): Promise<void> {
    const stream = this.stream;
    this.stream = null;
    if (!stream) return Promise.resolve();
    return new Promise((resolve) => stream.end(() => resolve()));
  }
}
