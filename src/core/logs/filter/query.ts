import { FUZZY_SELECTOR_PREFIX, INVERSE_SELECTOR } from '../../../shared/const.js';

export type QueryKind = 'none' | 'fuzzy' | 'inverse' | 'regex';

/** "-f ..." → 퍼지 모드 */
export function isFuzzySelector(q: string): boolean {
  return q.startsWith(FUZZY_SELECTOR_PREFIX);
}

/** "!..." → 정규식 매칭 반전 */
export function isInverseSelector(q: string): boolean {
  return q !== '' && q[0] === INVERSE_SELECTOR;
}

export function classifyQuery(q: string): QueryKind {
  if (q === '') return 'none';
  if (isFuzzySelector(q)) return 'fuzzy';
  if (isInverseSelector(q)) return 'inverse';
  return 'regex';
}

/** 퍼지 접두어를 떼고 앞뒤 공백 제거 */
export function fuzzyPattern(q: string): string {
  return q.slice(FUZZY_SELECTOR_PREFIX.length).trim();
}
