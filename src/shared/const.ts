
// 공용 상수 모음 (파서/렌더러/필터 공통)

// Logger
export const LOG_LEVEL_DEFAULT = 'debug' as const; // 'debug' | 'info' | 'warn' | 'error'
export const LOG_LEVEL_ENV = 'LOGVIEW_LOG_LEVEL' as const;
export const LOG_TOTAL_CALLS_THRESHOLD = 10_000;

// ── Render ───────────────────────────────────────────────────────────
/** 타임스탬프 컬럼 최소 폭(부족하면 공백 패딩, 넘치면 자르지 않음) */
export const TIMESTAMP_MIN_WIDTH = 30;
/** 타임스탬프 고정 색상 코드(256색 팔레트) */
export const TIMESTAMP_COLOR = 106;
/** 스캔용 라인(Lines/StrLines)에 쓰는 중립 색상 코드 */
export const NEUTRAL_COLOR = 0;

// ── Color assignment ─────────────────────────────────────────────────
/** 합산 해시가 0일 때 대신 쓰는 대역: [BASE, BASE + SPAN) */
export const COLOR_FALLBACK_BASE = 207;
export const COLOR_FALLBACK_SPAN = 10;
export const COLOR_PALETTE_SIZE = 256;
/** chalk 색상 레벨 2 = 256색 (TTY 감지와 무관하게 고정) */
export const COLOR_LEVEL = 2 as const;

// ── Filter query ─────────────────────────────────────────────────────
/** 퍼지 모드 접두어 */
export const FUZZY_SELECTOR_PREFIX = '-f' as const;
/** 정규식 모드에서 매칭 반전 접두어(한 글자) */
export const INVERSE_SELECTOR = '!' as const;

// ── Modifiers ────────────────────────────────────────────────────────
export const ZAP_PRETTY_MODIFIER = 'zap-pretty' as const;
// pino-pretty translateTime 형식(UTC 고정)
export const ZAP_TIME_FORMAT = 'UTC:yyyy-mm-dd HH:MM:ss.l' as const;
/** 모디파이어 미지정 */
export const NO_MODIFIER = '' as const;

// ── View config (env) ────────────────────────────────────────────────
export const ENV_SHOW_TIME = 'LOGVIEW_SHOW_TIME' as const;
export const ENV_MODIFIER = 'LOGVIEW_MODIFIER' as const;
export const ENV_SINGLE_CONTAINER = 'LOGVIEW_SINGLE_CONTAINER' as const;
