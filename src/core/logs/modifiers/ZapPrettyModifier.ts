import { prettyFactory } from 'pino-pretty';
import { z } from 'zod';

import { ZAP_TIME_FORMAT } from '../../../shared/const.js';
import type { LogModifier } from '../LogModifier.js';

// zap JSON 인코더 출력(production/development 공통 키)
const ZapRecord = z
  .object({
    level: z.string(),
    ts: z.union([z.number(), z.string()]),
    msg: z.string().optional(),
    caller: z.string().optional(),
    logger: z.string().optional(),
  })
  .passthrough();

export type ZapRecord = z.infer<typeof ZapRecord>;

// zap 레벨 → pino 숫자 레벨
const ZAP_LEVELS: Record<string, number> = {
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
  dpanic: 50,
  panic: 60,
  fatal: 60,
};

/** zap 레코드를 pino 로그 객체 모양으로 옮긴다. 알 수 없는 레벨이면 undefined */
export function toPinoRecord(rec: ZapRecord): Record<string, unknown> | undefined {
  const { level, ts, ...rest } = rec;
  const lv = ZAP_LEVELS[level.toLowerCase()];
  if (lv === undefined) return undefined;
  // epoch 초(소수) → ms. 문자열(ISO 등)은 그대로 둔다.
  const time = typeof ts === 'number' ? Math.round(ts * 1000) : ts;
  return { ...rest, level: lv, time };
}

/**
 * zap JSON 라인 → 사람이 읽는 한 줄.
 * 라인 앞쪽(타임스탬프/pod/container 접두어)은 보존하고 첫 '{'부터만 해석한다.
 */
export class ZapPrettyModifier implements LogModifier {
  private readonly pretty = prettyFactory({
    colorize: false,
    singleLine: true,
    translateTime: ZAP_TIME_FORMAT,
    ignore: 'pid,hostname',
  });

  modify(line: Buffer): Buffer {
    const text = line.toString('utf8');
    const start = text.indexOf('{');
    if (start < 0) return line;

    let raw: unknown;
    try {
      raw = JSON.parse(text.slice(start));
    } catch {
      return line;
    }
    const parsed = ZapRecord.safeParse(raw);
    if (!parsed.success) return line;
    const rec = toPinoRecord(parsed.data);
    if (!rec) return line;

    let out: string;
    try {
      out = this.pretty(rec);
    } catch {
      return line;
    }
    return Buffer.from(text.slice(0, start) + out.trimEnd(), 'utf8');
  }
}
