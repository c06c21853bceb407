import fuzzysort from 'fuzzysort';

import type { FilterResult } from '../../../shared/types.js';

type Candidate = { index: number; line: string };

/**
 * 패턴 전체(공백 포함)를 라인 위에서 앞에서부터 순서대로 찾는다(대소문자 무시).
 * 다 찾으면 위치들, 아니면 undefined.
 */
export function orderedPositions(pattern: string, line: string): number[] | undefined {
  const out: number[] = [];
  let j = 0;
  for (let i = 0; i < line.length && j < pattern.length; i++) {
    if (line[i].toLowerCase() === pattern[j].toLowerCase()) {
      out.push(i);
      j++;
    }
  }
  return j === pattern.length ? out : undefined;
}

/**
 * 퍼지(부분 수열) 필터. 순서는 랭킹 순(가장 잘 맞는 라인 먼저).
 * 빈 패턴/빈 컬렉션이면 빈 결과.
 */
export function filterByFuzzy(pattern: string, lines: readonly string[]): FilterResult {
  const q = pattern.trim();
  const matches: number[] = [];
  const indices: number[][] = [];
  if (!q || lines.length === 0) return { matches, indices };

  // fuzzysort는 공백을 검색어 구분자로 보고 각 조각을 순서 없이 찾는다.
  // 공백이 있으면 패턴 전체가 순서대로 나오는 라인만 남기고 위치도 그 순서로 다시 잡는다.
  const spaced = q.includes(' ');
  const candidates: Candidate[] = lines.map((line, index) => ({ index, line }));
  for (const hit of fuzzysort.go(q, candidates, { key: 'line' })) {
    if (!spaced) {
      matches.push(hit.obj.index);
      indices.push([...hit.indexes].sort((a, b) => a - b));
      continue;
    }
    const pos = orderedPositions(q, hit.obj.line);
    if (!pos) continue;
    matches.push(hit.obj.index);
    indices.push(pos);
  }
  return { matches, indices };
}
