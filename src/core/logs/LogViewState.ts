import { parseViewConfig, type ViewConfig, type ViewConfigInput } from '../config/schema.js';
import type { XError } from '../../shared/errors.js';
import type { FilterResult, LogSource, Result } from '../../shared/types.js';
import { getLogger } from '../logging/console-logger.js';
import { LogItem } from './LogItem.js';
import { LogItems, type LogItemsOptions } from './LogItems.js';

const log = getLogger('LogViewState');

const EMPTY: FilterResult = { matches: [], indices: [] };

/**
 * 뷰어 한 화면의 상태: 레코드 + 뷰 설정 + 현재 필터.
 * 잘못된 패턴이 들어오면 에러만 돌려주고 직전 필터/결과는 그대로 둔다.
 */
export class LogViewState {
  private readonly items: LogItems;
  private config: ViewConfig;
  private query = '';
  private result: FilterResult = EMPTY;

  constructor(config: ViewConfigInput = {}, opts: LogItemsOptions = {}) {
    this.config = parseViewConfig(config);
    this.items = new LogItems([], opts);
  }

  get size(): number {
    return this.items.length;
  }
  get filterQuery(): string {
    return this.query;
  }
  get filterResult(): FilterResult {
    return this.result;
  }
  get viewConfig(): ViewConfig {
    return { ...this.config };
  }

  /** 수신 청크 추가. 필터가 걸려 있으면 다시 적용 */
  append(raw: Buffer | string, source: LogSource = {}): number {
    const added = LogItems.parse(raw, {
      ...source,
      singleContainer: source.singleContainer ?? this.config.singleContainer,
    });
    this.items.push(...added);
    if (added.length) this.refresh();
    return added.length;
  }

  /** 상태 메시지(합성 레코드) 추가 */
  notify(message: string): void {
    this.items.push(LogItem.fromString(message));
    this.refresh();
  }

  setShowTime(showTime: boolean): void {
    this.config = { ...this.config, showTime };
    this.refresh();
  }

  setModifier(modifier: string): void {
    this.config = { ...this.config, modifier };
    this.refresh();
  }

  setFilter(q: string): Result<FilterResult, XError> {
    const r = this.items.filter(q, this.config.showTime, this.config.modifier);
    if (!r.ok) return r;
    this.query = q;
    this.result = r.value;
    return r;
  }

  clearFilter(): void {
    this.query = '';
    this.result = EMPTY;
  }

  clear(): void {
    this.items.clear();
    this.clearFilter();
  }

  /** 필터가 없으면 전체, 있으면 매칭 순서대로 매칭 라인만 */
  display(): Buffer[] {
    const all: Buffer[] = new Array<Buffer>(this.items.length);
    this.items.render(this.config.showTime, this.config.modifier, all);
    if (!this.query) return all;
    return this.result.matches.map((i) => all[i]);
  }

  /** 현재 쿼리 재적용. 이미 한 번 통과한 쿼리라 실패하지 않지만, 실패하면 직전 결과 유지 */
  private refresh(): void {
    if (!this.query) return;
    const r = this.items.filter(this.query, this.config.showTime, this.config.modifier);
    if (!r.ok) {
      log.warn('refilter failed, keeping previous result', this.query);
      return;
    }
    this.result = r.value;
  }
}
