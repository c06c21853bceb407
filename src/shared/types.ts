export type Ok<T> = { ok: true; value: T };
export type Err<E = unknown> = { ok: false; error: E };
export type Result<T, E = unknown> = Ok<T> | Err<E>;
export const ok = <T>(value: T): Ok<T> => ({ ok: true, value });
export const err = <E>(error: E): Err<E> => ({ ok: false, error });

// 로그 관련
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/** 필터 결과: 매칭된 원본 인덱스 + 라인별 하이라이트 위치 */
export type FilterResult = {
  matches: number[];
  indices: number[][];
};

/** 스트림 청크에 붙는 출처 정보 */
export type LogSource = {
  pod?: string;
  container?: string;
  singleContainer?: boolean;
};
