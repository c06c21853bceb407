import * as fs from 'fs';
import * as path from 'path';
import { inspect } from 'util';

import { LOG_LEVEL_DEFAULT, LOG_LEVEL_ENV } from '../../shared/const.js';
import type { LogLevel } from '../../shared/types.js';
import { isTestMode } from './test-mode.js';

type Fn = (msg?: unknown, ...args: unknown[]) => void;
export type Logger = { debug: Fn; info: Fn; warn: Fn; error: Fn };

const levelRank: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

function isLevel(v: string): v is LogLevel {
  return Object.prototype.hasOwnProperty.call(levelRank, v);
}

function currentLevel(): LogLevel {
  const raw = (process.env[LOG_LEVEL_ENV] || LOG_LEVEL_DEFAULT).toString().toLowerCase();
  return isLevel(raw) ? raw : LOG_LEVEL_DEFAULT;
}

export function enabled(lv: LogLevel): boolean {
  return levelRank[lv] >= levelRank[currentLevel()];
}

// 테스트 시 파일로 로그를 모은다: src/__test__/out/console.log
export const TEST_LOG_PATH = path.resolve(
  __dirname,
  '..', '..',           // → src
  '__test__',
  'out',
  'console.log',
);

let _testDirReady = false;
function fileSinkWrite(level: LogLevel, parts: unknown[]) {
  if (!_testDirReady) {
    fs.mkdirSync(path.dirname(TEST_LOG_PATH), { recursive: true });
    _testDirReady = true;
  }
  const ts = new Date().toISOString();
  const body = parts
    .filter((p) => p !== undefined)
    .map((p) =>
      typeof p === 'string'
        ? p
        : inspect(p, { depth: 5, maxArrayLength: 200, breakLength: Infinity }),
    )
    .join(' ');
  fs.appendFileSync(TEST_LOG_PATH, `${ts} ${level.toUpperCase()} ${body}\n`, 'utf8');
}

/** 콘솔 백엔드 로거: 호출부 포맷은 유지하고, prefix만 붙여준다. */
export function getLogger(name: string): Logger {
  const prefix = `[${name}]`;
  if (isTestMode()) {
    // 테스트 환경: 파일로 로그를 남긴다.
    const mk = (lv: LogLevel): Fn => (msg?: unknown, ...args: unknown[]) => {
      if (!enabled(lv)) return;
      fileSinkWrite(lv, [prefix, msg, ...args]);
    };
    return { debug: mk('debug'), info: mk('info'), warn: mk('warn'), error: mk('error') };
  }
  // 일반 실행 환경: 콘솔에 출력
  const wrap = (lv: LogLevel, fn: (...a: unknown[]) => void): Fn => (msg?: unknown, ...args: unknown[]) => {
    if (!enabled(lv)) return;
    fn(prefix, msg, ...args);
  };
  return {
    debug: wrap('debug', console.debug.bind(console)),
    info: wrap('info', console.log.bind(console)),
    warn: wrap('warn', console.warn.bind(console)),
    error: wrap('error', console.error.bind(console)),
  };
}
