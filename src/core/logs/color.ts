import chalk from 'chalk';

import {
  COLOR_FALLBACK_BASE,
  COLOR_FALLBACK_SPAN,
  COLOR_LEVEL,
  COLOR_PALETTE_SIZE,
} from '../../shared/const.js';

/** [0, 1) 난수 공급원 */
export type RandomSource = () => number;

// 뷰어가 ANSI 시퀀스를 해석하므로 TTY 감지와 무관하게 256색으로 고정
const painter = new chalk.Instance({ level: COLOR_LEVEL });

/** text를 256색 전경색 시퀀스로 감싼다. 빈 문자열은 그대로. */
export function colorize(text: string, code: number): string {
  return painter.ansi256(code)(text);
}

/**
 * 식별자(pod/container) → 색상 코드.
 * 코드포인트 합을 256으로 나눈 나머지. 0이 나오면 [207, 217) 대역에서 random으로 고른다.
 */
export function colorFor(identity: string, random: RandomSource = Math.random): number {
  let sum = 0;
  for (const ch of identity) {
    sum += ch.codePointAt(0) ?? 0;
  }
  const c = sum % COLOR_PALETTE_SIZE;
  if (c !== 0) return c;
  return COLOR_FALLBACK_BASE + Math.floor(random() * COLOR_FALLBACK_SPAN);
}
