import { NEUTRAL_COLOR } from '../../shared/const.js';
import type { XError } from '../../shared/errors.js';
import { ok, type FilterResult, type LogSource, type Result } from '../../shared/types.js';
import { getLogger } from '../logging/console-logger.js';
import { measure } from '../logging/perf.js';
import { colorFor, type RandomSource } from './color.js';
import { filterByFuzzy } from './filter/FuzzyFilter.js';
import { filterByRegex } from './filter/RegexFilter.js';
import { fuzzyPattern, isFuzzySelector } from './filter/query.js';
import { LogItem } from './LogItem.js';
import type { IModifierRegistry } from './LogModifier.js';
import { defaultModifiers } from './modifiers/index.js';
import { sanitizeLineBytes, stripBomStartBytes } from './Sanitizer.js';

const log = getLogger('LogItems');

const NEWLINE = 0x0a;

export type LogItemsOptions = {
  registry?: IModifierRegistry;
  /** colorFor 폴백 대역용 난수 */
  random?: RandomSource;
};

/** 로그 레코드 컬렉션(순서 유지, 레코드 단독 소유) */
export class LogItems implements Iterable<LogItem> {
  private items: LogItem[];
  private readonly registry: IModifierRegistry;
  private readonly random: RandomSource | undefined;

  constructor(items: LogItem[] = [], opts: LogItemsOptions = {}) {
    this.items = items;
    this.registry = opts.registry ?? defaultModifiers;
    this.random = opts.random;
  }

  /**
   * 수신 청크 → 레코드들.
   * - 빈 라인은 건너뜀(마지막 개행 뒤 조각 포함)
   * - 출처(pod/container/singleContainer)는 모든 레코드에 동일하게 찍힌다
   */
  static parse(raw: Buffer | string, source: LogSource = {}): LogItem[] {
    const buf = stripBomStartBytes(typeof raw === 'string' ? Buffer.from(raw, 'utf8') : raw);
    const out: LogItem[] = [];
    for (let start = 0; start <= buf.length; ) {
      let end = buf.indexOf(NEWLINE, start);
      if (end < 0) end = buf.length;
      const line = sanitizeLineBytes(buf.subarray(start, end));
      start = end + 1;
      if (!line.length) continue;
      const item = LogItem.fromBytes(line);
      item.pod = source.pod ?? '';
      item.container = source.container ?? '';
      item.singleContainer = source.singleContainer ?? false;
      out.push(item);
    }
    return out;
  }

  get length(): number {
    return this.items.length;
  }

  get(i: number): LogItem | undefined {
    return this.items[i];
  }

  push(...items: LogItem[]): number {
    return this.items.push(...items);
  }

  clear(): void {
    this.items = [];
  }

  toArray(): LogItem[] {
    return [...this.items];
  }

  [Symbol.iterator](): Iterator<LogItem> {
    return this.items[Symbol.iterator]();
  }

  /** 기계 스캔용: 중립 색상으로 렌더 */
  lines(showTime: boolean, modifier: string): Buffer[] {
    return this.items.map((item) => item.render(NEUTRAL_COLOR, showTime, modifier, this.registry));
  }

  /** 퍼지/정규식 입력용 문자열 라인 */
  strLines(showTime: boolean, modifier: string): string[] {
    return this.lines(showTime, modifier).map((b) => b.toString('utf8'));
  }

  /** 표시용: 레코드별 식별자 색상. 색상 맵은 호출 1회 동안만 유지 */
  @measure('LogItems.render')
  render(showTime: boolean, modifier: string, out: Buffer[]): void {
    const colors = new Map<string, number>();
    this.items.forEach((item, i) => {
      const id = item.id();
      let color = colors.get(id);
      if (color === undefined) {
        color = colorFor(id, this.random);
        colors.set(id, color);
      }
      out[i] = item.render(color, showTime, modifier, this.registry);
    });
  }

  /**
   * 쿼리 필터
   * - ""        → 필터 없음(빈 결과)
   * - "-f ..."  → 퍼지(실패 없음)
   * - 그 외     → 정규식("!" 반전). 컴파일 실패 시 InvalidPattern
   */
  @measure('LogItems.filter')
  filter(q: string, showTime: boolean, modifier: string): Result<FilterResult, XError> {
    if (q === '') return ok({ matches: [], indices: [] });
    if (isFuzzySelector(q)) {
      return ok(filterByFuzzy(fuzzyPattern(q), this.strLines(showTime, modifier)));
    }
    const res = filterByRegex(q, this.strLines(showTime, modifier));
    if (!res.ok) log.error('logs filter failed', res.error.message);
    return res;
  }

  dumpDebug(label: string): void {
    log.debug(label + '-'.repeat(50));
    this.items.forEach((item, i) => log.debug(i, item.info(), item.bytes.toString('utf8')));
  }
}
