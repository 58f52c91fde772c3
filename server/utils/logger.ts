import fs from 'fs';
import path from 'path';

export interface LoggerOptions {
  enabled: boolean;
  logFile: string;
}

class Logger {
  private enabled: boolean = false;
  private stream: fs.WriteStream | null = null;

  configure(options: LoggerOptions): void {
    this.close();
    this.enabled = options.enabled;

    if (this.enabled) {
      fs.mkdirSync(path.dirname(options.logFile), { recursive: true });

      // Clear log file on startup
      fs.writeFileSync(options.logFile, `=== Server started at ${new Date().toISOString()} ===\n`);

      this.stream = fs.createWriteStream(options.logFile, { flags: 'a' });

      console.log(`Debug logging enabled. Log file: ${options.logFile}`);
    }
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  log(category: string, message: string, data?: unknown): void {
    if (!this.enabled) return;

    const timestamp = new Date().toISOString();
    const logLine = data !== undefined
      ? `[${timestamp}] [${category}] ${message} ${JSON.stringify(data)}\n`
      : `[${timestamp}] [${category}] ${message}\n`;

    this.stream?.write(logLine);
  }

  // For clients to send logs
  logFromClient(clientId: string, category: string, message: string, data?: unknown): void {
    this.log(`CLIENT:${clientId}`, `[${category}] ${message}`, data);
  }

  close(): void {
    this.stream?.end();
    this.stream = null;
  }
}

export const logger = new Logger();
