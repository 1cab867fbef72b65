import chalk from 'chalk';
import * as fs from 'fs-extra';
import * as path from 'path';
import { config, LoggingConfig } from '../config/config';

export enum LogLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.ERROR]: 3,
};

export class Logger {
  private logDir: string;
  private writeEnabled: boolean;
  private minLevel: LogLevel;

  constructor(options: LoggingConfig = config.logging) {
    this.logDir = path.resolve(process.cwd(), options.logDir);
    this.writeEnabled = options.writeToFile;
    this.minLevel = LogLevel[options.level];
    if (this.writeEnabled) {
      fs.ensureDirSync(this.logDir);
    }
  }

  private formatMessage(level: LogLevel, message: string, ...args: unknown[]): string {
    const timestamp = new Date().toISOString();
    const formattedArgs = args.map(arg =>
      typeof arg === 'object' ? JSON.stringify(arg, null, 2) : String(arg)
    ).join(' ');
    return `[${timestamp}] [${level}] ${message} ${formattedArgs}`.trimEnd();
  }

  private writeToFile(formatted: string): void {
    if (!this.writeEnabled) return;
    const logFile = path.join(this.logDir, `${new Date().toISOString().split('T')[0]}.log`);
    fs.appendFileSync(logFile, formatted + '\n');
  }

  private enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.minLevel];
  }

  debug(message: string, ...args: unknown[]): void {
    if (!this.enabled(LogLevel.DEBUG)) return;
    const formatted = this.formatMessage(LogLevel.DEBUG, message, ...args);
    console.log(chalk.gray(formatted));
    this.writeToFile(formatted);
  }

  info(message: string, ...args: unknown[]): void {
    if (!this.enabled(LogLevel.INFO)) return;
    const formatted = this.formatMessage(LogLevel.INFO, message, ...args);
    console.log(chalk.blue(formatted));
    this.writeToFile(formatted);
  }

  success(message: string, ...args: unknown[]): void {
    if (!this.enabled(LogLevel.INFO)) return;
    const formatted = this.formatMessage(LogLevel.INFO, message, ...args);
    console.log(chalk.green(formatted));
    this.writeToFile(formatted);
  }

  warn(message: string, ...args: unknown[]): void {
    if (!this.enabled(LogLevel.WARN)) return;
    const formatted = this.formatMessage(LogLevel.WARN, message, ...args);
    console.log(chalk.yellow(formatted));
    this.writeToFile(formatted);
  }

  error(message: string, ...args: unknown[]): void {
    if (!this.enabled(LogLevel.ERROR)) return;
    const formatted = this.formatMessage(LogLevel.ERROR, message, ...args);
    console.error(chalk.red(formatted));
    this.writeToFile(formatted);
  }
}

export const logger = new Logger();
