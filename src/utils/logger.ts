import * as winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];

export interface LoggerOptions {
  /** 최소 로그 레벨 (기본 info) */
  level?: LogLevel;
  /** 콘솔 출력 여부 (기본 true) */
  console?: boolean;
  /** 지정 시 일별 로테이션 파일 로그 기록 */
  logsDir?: string;
  /** 모든 출력 차단 (테스트용) */
  silent?: boolean;
}

// 로그 포맷 정의
const logFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.printf(({ timestamp, level, message, stack, ...meta }) => {
    let log = `[${timestamp}] [${level.toUpperCase()}] ${message}`;
    if (Object.keys(meta).length > 0) {
      log += ` ${JSON.stringify(meta)}`;
    }
    if (stack) {
      log += `\n${stack}`;
    }
    return log;
  })
);

// 콘솔용 컬러 포맷
const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: 'HH:mm:ss' }),
  winston.format.printf(({ timestamp, level, message, ...meta }) => {
    let log = `[${timestamp}] ${level}: ${message}`;
    if (Object.keys(meta).length > 0) {
      log += ` ${JSON.stringify(meta)}`;
    }
    return log;
  })
);

/**
 * 리포팅 핸들
 *
 * 전역 싱글톤 대신 각 컴포넌트 호출에 명시적으로 전달한다.
 */
class Logger {
  private logger: winston.Logger;

  constructor(options: LoggerOptions = {}) {
    const transports: winston.transport[] = [];

    if (options.console !== false) {
      // 경고 이상은 stderr로 보내 stdout 출력과 섞이지 않게 한다
      transports.push(
        new winston.transports.Console({
          format: consoleFormat,
          stderrLevels: ['error', 'warn'],
        })
      );
    }

    if (options.logsDir) {
      transports.push(
        new DailyRotateFile({
          dirname: options.logsDir,
          filename: 'binforge-%DATE%.log',
          datePattern: 'YYYY-MM-DD',
          maxSize: '20m',
          maxFiles: '14d',
          format: logFormat,
        })
      );
    }

    this.logger = winston.createLogger({
      level: options.level ?? 'info',
      format: logFormat,
      silent: options.silent === true,
      transports,
    });
  }

  get level(): LogLevel {
    return parseLogLevel(this.logger.level) ?? 'info';
  }

  setLevel(level: LogLevel): void {
    this.logger.level = level;
  }

  /**
   * 에러 로그
   */
  error(message: string, meta?: Record<string, unknown>): void {
    this.logger.error(message, meta);
  }

  /**
   * 경고 로그
   */
  warn(message: string, meta?: Record<string, unknown>): void {
    this.logger.warn(message, meta);
  }

  /**
   * 정보 로그
   */
  info(message: string, meta?: Record<string, unknown>): void {
    this.logger.info(message, meta);
  }

  /**
   * 디버그 로그
   */
  debug(message: string, meta?: Record<string, unknown>): void {
    this.logger.debug(message, meta);
  }

  /**
   * 에러 객체를 로깅합니다.
   */
  logError(error: Error, context?: string): void {
    this.error(context ? `${context}: ${error.message}` : error.message, {
      stack: error.stack,
      name: error.name,
    });
  }
}

/**
 * 문자열을 로그 레벨로 변환 (대소문자 무시, 알 수 없으면 null)
 */
export function parseLogLevel(raw: string): LogLevel | null {
  const value = raw.trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === value) ?? null;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  return new Logger(options);
}

/**
 * 아무것도 출력하지 않는 로거
 */
export function createSilentLogger(): Logger {
  return new Logger({ console: false, silent: true });
}

export { Logger };
