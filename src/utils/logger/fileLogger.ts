import fs from 'fs';
import path from 'path';
import schedule, { type Job } from 'node-schedule';
import { ensureDirExistence } from '../ensureDirExistence.js';
import { rotateFile, RotateFileOptions } from '../rotateFile.js';
import { isTest } from '../isTest.js';

type ConsoleLevel = 'log' | 'info' | 'warn' | 'error';

/**
 * Tee console output into a daily-rotated log file. Returns the job that
 * rotates the file at midnight.
 */
export function installFileLogger(
  logFile: string = process.env.LOG_FILE_PATH || path.resolve(process.cwd(), 'data/edge-analyzer.log'),
): Job {
  ensureDirExistence(logFile);

  const rotateFileOptions: RotateFileOptions = {
    dir: path.dirname(logFile),
    filename: path.basename(logFile),
    retentionDays: parseInt(process.env.LOG_RETENTION_DAYS || '7', 10),
  };

  rotateFile(rotateFileOptions);
  let logStream = fs.createWriteStream(logFile, { flags: 'a' });

  const job = schedule.scheduleJob('0 0 * * *', () => {
    logStream.end();
    rotateFile(rotateFileOptions);
    logStream = fs.createWriteStream(logFile, { flags: 'a' });
  });

  const write = (level: ConsoleLevel, args: unknown[]) => {
    const now = new Date().toISOString();
    logStream.write(`[${now}] [${level.toUpperCase()}] ${args.map(String).join(' ')}\n`);
  };

  for (const level of ['log', 'info', 'warn', 'error'] as const) {
    const original = console[level].bind(console);
    console[level] = (...args: unknown[]) => {
      write(level, args);
      original(...args);
    };
  }

  return job;
}

if (!isTest) {
  installFileLogger();
}
