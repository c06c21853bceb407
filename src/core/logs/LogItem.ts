import { NEUTRAL_COLOR, TIMESTAMP_COLOR, TIMESTAMP_MIN_WIDTH } from '../../shared/const.js';
import { colorize } from './color.js';
import type { IModifierRegistry } from './LogModifier.js';
import { defaultModifiers } from './modifiers/index.js';

const SPACE = 0x20;
const NEWLINE = 0x0a;

// 로그 본문 안의 "[...]" 토큰이 뷰어의 색상 지시자로 해석되지 않도록 빈 괄호쌍을 끼워 넣는다.
// 패턴/치환 문자열은 뷰어 쪽 규칙과 바이트 단위로 일치해야 한다.
export const ESC_PATTERN = /(\[[a-zA-Z0-9_,;: \-."#]+\[*)\]/g;
const ESC_REPLACEMENT = '$1[]';

export function escapeTags(msg: string): string {
  return msg.replace(ESC_PATTERN, ESC_REPLACEMENT);
}

export type LogItemInit = {
  pod?: string;
  container?: string;
  timestamp?: string;
  singleContainer?: boolean;
  bytes?: Buffer;
};

/** 컨테이너 로그 한 줄 */
export class LogItem {
  pod: string;
  container: string;
  timestamp: string;
  singleContainer: boolean;
  /** 메시지 본문(타임스탬프/개행 제외) */
  bytes: Buffer;

  constructor(init: LogItemInit = {}) {
    this.pod = init.pod ?? '';
    this.container = init.container ?? '';
    this.timestamp = init.timestamp ?? '';
    this.singleContainer = init.singleContainer ?? false;
    this.bytes = init.bytes ?? Buffer.alloc(0);
  }

  /**
   * 스트림 라인 파싱: "<timestamp> <message...>\n"
   * - 끝의 개행 하나만 제거(없으면 그대로)
   * - 공백이 없으면 전체가 timestamp, 본문은 빈 값
   */
  static fromBytes(raw: Buffer | string): LogItem {
    let b = typeof raw === 'string' ? Buffer.from(raw, 'utf8') : raw;
    if (b.length && b[b.length - 1] === NEWLINE) b = b.subarray(0, b.length - 1);

    const cut = b.indexOf(SPACE);
    if (cut < 0) {
      return new LogItem({ timestamp: b.toString('utf8') });
    }
    // 첫 토큰 뒤를 공백 기준으로 다시 이어붙이는 것 = 첫 공백 뒤 원문 그대로
    return new LogItem({
      timestamp: b.subarray(0, cut).toString('utf8'),
      bytes: Buffer.from(b.subarray(cut + 1)),
    });
  }

  /** 합성(상태) 메시지. 타임스탬프는 현재 로컬 시각. */
  static fromString(s: string): LogItem {
    return new LogItem({
      bytes: Buffer.from(s, 'utf8'),
      timestamp: new Date().toString(),
    });
  }

  /** pod 우선, 없으면 container */
  id(): string {
    return this.pod || this.container;
  }

  info(): string {
    return `${JSON.stringify(this.pod)}::${JSON.stringify(this.container)}`;
  }

  clone(): LogItem {
    return new LogItem({
      pod: this.pod,
      container: this.container,
      timestamp: this.timestamp,
      singleContainer: this.singleContainer,
      bytes: Buffer.from(this.bytes),
    });
  }

  isEmpty(): boolean {
    return this.bytes.length === 0;
  }

  render(
    paint: number = NEUTRAL_COLOR,
    showTime = false,
    modifier = '',
    registry: IModifierRegistry = defaultModifiers,
  ): Buffer {
    const parts: string[] = [];
    if (showTime) {
      parts.push(colorize(this.timestamp.padEnd(TIMESTAMP_MIN_WIDTH, ' '), TIMESTAMP_COLOR), ' ');
    }
    if (this.pod) {
      parts.push(colorize(this.pod, paint), ':');
    }
    if (!this.singleContainer && this.container) {
      parts.push(colorize(this.container, paint), ' ');
    }
    // 패턴/치환이 ASCII뿐이라 latin1로 돌리면 본문 바이트가 그대로 유지된다
    const body = Buffer.from(escapeTags(this.bytes.toString('latin1')), 'latin1');

    const line = Buffer.concat([Buffer.from(parts.join(''), 'utf8'), body]);
    return registry.apply(modifier, line);
  }
}
