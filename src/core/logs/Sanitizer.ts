// === src/core/logs/Sanitizer.ts ===
// 스트림에서 받은 라인을 LogItem으로 만들기 전에 거치는 정규화.
// 메시지 본문은 렌더 단계의 이스케이프 치환이 담당하므로 여기서는 바이트 수준 잡음만 다룬다.

export type SanitizeOptions = {
  /** 줄 끝 CR 제거(CRLF 스트림) */
  stripTrailingCR: boolean;
  /** 라인 중간에 섞여 온 U+FEFF 제거 */
  dropIntralineBOM: boolean;
  /** 탭 제외 제어문자 제거. ANSI 색상까지 지워지므로 기본 false */
  dropControlExceptTab: boolean;
};

export const DEFAULT_SANITIZE: SanitizeOptions = {
  stripTrailingCR: true,
  dropIntralineBOM: true,
  dropControlExceptTab: false,
};

const INTRALINE_BOM_RE = /\uFEFF/g;
// eslint-disable-next-line no-control-regex
const CTRL_EXCEPT_TAB_RE = /[\u0000-\u0008\u000B\u000C\u000E-\u001F\u007F]/g;

export function dropIntralineBOM(s: string): string {
  return s.replace(INTRALINE_BOM_RE, '');
}

export function dropControlExceptTab(s: string): string {
  return s.replace(CTRL_EXCEPT_TAB_RE, '');
}

/** 단일 라인 단위 정리(개행으로 분리한 뒤 적용) */
export function sanitizeLine(line: string, opt: Partial<SanitizeOptions> = {}): string {
  const o = { ...DEFAULT_SANITIZE, ...opt };
  let s = line;
  if (o.stripTrailingCR) s = s.replace(/\r$/, '');
  if (o.dropIntralineBOM) s = dropIntralineBOM(s);
  if (o.dropControlExceptTab) s = dropControlExceptTab(s);
  return s;
}

// ── 바이트 라인 ─────────────────────────────────────────────
// latin1은 바이트 ↔ 문자 1:1이라 UTF-8이 아닌 바이트도 그대로 보존된다.
// U+FEFF는 UTF-8로 EF BB BF 세 바이트다.
const UTF8_BOM = Buffer.from([0xef, 0xbb, 0xbf]);
const LATIN1_BOM_RE = /\u00EF\u00BB\u00BF/g;

/** 청크 "시작 위치" BOM만 제거 */
export function stripBomStartBytes(b: Buffer): Buffer {
  return b.subarray(0, UTF8_BOM.length).equals(UTF8_BOM) ? b.subarray(UTF8_BOM.length) : b;
}

/** sanitizeLine의 바이트 버전. 건드리지 않은 바이트는 비트 단위로 그대로 */
export function sanitizeLineBytes(line: Buffer, opt: Partial<SanitizeOptions> = {}): Buffer {
  const o = { ...DEFAULT_SANITIZE, ...opt };
  let s = line.toString('latin1');
  if (o.stripTrailingCR) s = s.replace(/\r$/, '');
  if (o.dropIntralineBOM) s = s.replace(LATIN1_BOM_RE, '');
  if (o.dropControlExceptTab) s = dropControlExceptTab(s);
  return Buffer.from(s, 'latin1');
}
