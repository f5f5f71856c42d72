import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';

import { consoleLogger, type Logger } from '../logger.js';

export interface InvalidResponseReport {
  endpoint: string;
  url: string;
  statusCode: number;
  errorMessage: string;
  issues: string[];
  responseBody: unknown;
}

/** Out-of-band channel for upstream payloads that failed validation. */
export interface InvalidResponseSink {
  record(report: InvalidResponseReport): Promise<void>;
}

const sanitize = (value: string) => value.replace(/[^a-zA-Z0-9_-]+/g, '_').replace(/^_+|_+$/g, '') || 'unknown';

/**
 * Writes one JSON artifact per rejected payload as
 * `<dir>/<timestamp>_<endpoint>.json`.
 */
export class FileInvalidResponseSink implements InvalidResponseSink {
  constructor(
    private readonly directory: string,
    private readonly now: () => Date = () => new Date()
  ) {}

  async record(report: InvalidResponseReport): Promise<void> {
    const timestamp = this.now().toISOString();
    const fileName = `${timestamp.replace(/[:.]/g, '-')}_${sanitize(report.endpoint)}.json`;
    await mkdir(this.directory, { recursive: true });
    await writeFile(
      join(this.directory, fileName),
      JSON.stringify(
        {
          timestamp,
          endpoint: report.endpoint,
          url: report.url,
          status_code: report.statusCode,
          error_message: report.errorMessage,
          issues: report.issues,
          response_body: report.responseBody,
        },
        null,
        2
      ),
      'utf8'
    );
  }
}

export class LogInvalidResponseSink implements InvalidResponseSink {
  constructor(private readonly logger: Logger = consoleLogger) {}

  async record(report: InvalidResponseReport): Promise<void> {
    this.logger.warn('invalid_response', {
      endpoint: report.endpoint,
      url: report.url,
      statusCode: report.statusCode,
      issues: report.issues,
    });
  }
}
