import * as fs from 'fs';
import * as path from 'path';

/**
 * Configuration for file transport
 */
export interface FileTransportConfig {
  /** Base directory for logs (default: 'logs') */
  logDir: string;
  /** Service name for file grouping (e.g., 'batch', 'gateway') */
  service: string;
  /** Max file size in bytes before rotation (default: 20MB) */
  maxSize: number;
  /** Number of rotated files to keep (default: 5) */
  maxFiles: number;
  /** Also write ERROR/FATAL entries to a separate .error.log file */
  separateErrorLog: boolean;
}

export const DEFAULT_FILE_CONFIG: FileTransportConfig = {
  logDir: 'logs',
  service: 'quarry',
  maxSize: 20 * 1024 * 1024,
  maxFiles: 5,
  separateErrorLog: true,
};

type LogFileKind = 'main' | 'error';

interface OpenFile {
  stream: fs.WriteStream;
  size: number;
}

function getDateString(): string {
  return new Date().toISOString().split('T')[0];
}

/**
 * JSON-lines log files with daily naming and size-based rotation
 *
 * - {service}-{YYYY-MM-DD}.log holds every entry
 * - {service}-{YYYY-MM-DD}.error.log holds ERROR and FATAL entries only,
 *   so failed symbols of a long batch can be scanned without the noise
 */
export class FileTransport {
  private config: FileTransportConfig;
  private currentDate: string;
  private files = new Map<LogFileKind, OpenFile>();

  constructor(config: Partial<FileTransportConfig> = {}) {
    this.config = { ...DEFAULT_FILE_CONFIG, ...config };
    this.currentDate = getDateString();
    fs.mkdirSync(this.config.logDir, { recursive: true });
  }

  getLogFilePath(kind: LogFileKind, date: string = this.currentDate): string {
    const suffix = kind === 'main' ? '.log' : '.error.log';
    return path.join(this.config.logDir, `${this.config.service}-${date}${suffix}`);
  }

  /**
   * Write a log entry to the main log file (and the error log for ERROR/FATAL)
   */
  write(entry: Record<string, unknown>): void {
    this.append('main', entry);

    const level = entry.level;
    if (this.config.separateErrorLog && (level === 'ERROR' || level === 'FATAL')) {
      this.append('error', entry);
    }
  }

  private append(kind: LogFileKind, entry: Record<string, unknown>): void {
    const line = JSON.stringify(entry) + '\n';
    const file = this.getFile(kind);
    file.stream.write(line);
    file.size += Buffer.byteLength(line, 'utf8');
  }

  private getFile(kind: LogFileKind): OpenFile {
    const today = getDateString();
    if (today !== this.currentDate) {
      this.closeStreams();
      this.currentDate = today;
    }

    const open = this.files.get(kind);
    if (open && open.size < this.config.maxSize) {
      return open;
    }
    if (open) {
      open.stream.end();
      this.files.delete(kind);
      this.rotateFiles(kind);
    }

    const filePath = this.getLogFilePath(kind);
    const size = fs.existsSync(filePath) ? fs.statSync(filePath).size : 0;
    const created: OpenFile = { stream: fs.createWriteStream(filePath, { flags: 'a' }), size };
    this.files.set(kind, created);
    return created;
  }

  /**
   * Shift {file}.1 .. {file}.N-1 up by one and move the live file to .1
   */
  private rotateFiles(kind: LogFileKind): void {
    const basePath = this.getLogFilePath(kind);

    const oldestPath = `${basePath}.${this.config.maxFiles}`;
    if (fs.existsSync(oldestPath)) {
      fs.unlinkSync(oldestPath);
    }

    for (let i = this.config.maxFiles - 1; i >= 1; i--) {
      const oldPath = `${basePath}.${i}`;
      if (fs.existsSync(oldPath)) {
        fs.renameSync(oldPath, `${basePath}.${i + 1}`);
      }
    }

    if (fs.existsSync(basePath)) {
      fs.renameSync(basePath, `${basePath}.1`);
    }
  }

  closeStreams(): void {
    for (const file of this.files.values()) {
      file.stream.end();
    }
    this.files.clear();
  }

  /**
   * End every open stream and resolve once their data reached the file.
   * A later write reopens the file in append mode.
   */
  async flush(): Promise<void> {
    const open = [...this.files.values()];
    this.files.clear();
    await Promise.all(
      open.map((file) => new Promise<void>((resolve) => file.stream.end(() => resolve())))
    );
  }
}
