import { ErrorCategory, XError } from '../../../shared/errors.js';
import { err, ok, type FilterResult, type Result } from '../../../shared/types.js';
import { isInverseSelector } from './query.js';

/** 대소문자 무시 정규식 컴파일. 실패 시 InvalidPattern */
export function compilePattern(pattern: string): Result<RegExp, XError> {
  try {
    return ok(new RegExp(pattern, 'gi'));
  } catch (e) {
    return err(
      new XError(
        ErrorCategory.InvalidPattern,
        `invalid filter pattern: ${e instanceof Error ? e.message : String(e)}`,
        { pattern },
      ),
    );
  }
}

/** 라인 안의 모든 매칭 구간 [start, end) — 길이 0 매칭도 "매칭됨"으로 센다 */
export function matchSpans(rx: RegExp, line: string): Array<[number, number]> {
  const spans: Array<[number, number]> = [];
  for (const m of line.matchAll(rx)) {
    const start = m.index ?? 0;
    spans.push([start, start + m[0].length]);
  }
  return spans;
}

function expand(spans: Array<[number, number]>): number[] {
  const out: number[] = [];
  for (const [s, e] of spans) {
    for (let j = s; j < e; j++) out.push(j);
  }
  return out;
}

/**
 * 정규식 필터
 * - "!" 접두어: 매칭되지 않는 라인만 남김(하이라이트 없음)
 * - 결과는 원본 인덱스 오름차순
 */
export function filterByRegex(q: string, lines: readonly string[]): Result<FilterResult, XError> {
  const invert = isInverseSelector(q);
  const compiled = compilePattern(invert ? q.slice(1) : q);
  if (!compiled.ok) return compiled;

  const rx = compiled.value;
  const matches: number[] = [];
  const indices: number[][] = [];
  lines.forEach((line, i) => {
    const spans = matchSpans(rx, line);
    const hit = spans.length > 0;
    if (hit === invert) return;
    matches.push(i);
    indices.push(invert ? [] : expand(spans));
  });
  return ok({ matches, indices });
}
