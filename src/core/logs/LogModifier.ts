import { getLogger } from '../logging/console-logger.js';

const log = getLogger('LogModifier');

/**
 * 렌더된 라인 후처리기.
 * - 전체 함수여야 한다: 내부 파싱 실패 시 입력을 그대로 돌려준다(fail-open)
 */
export interface LogModifier {
  modify(line: Buffer): Buffer;
}

export interface IModifierRegistry {
  register(name: string, modifier: LogModifier): void;
  get(name: string): LogModifier | undefined;
  apply(name: string, line: Buffer): Buffer;
}

/**
 * 이름 → 모디파이어 맵. 추가/덮어쓰기만 있고 삭제는 없다.
 * 등록은 렌더가 시작되기 전에 끝나야 한다(동기화 없음).
 */
export class ModifierRegistry implements IModifierRegistry {
  private readonly modifiers = new Map<string, LogModifier>();

  register(name: string, modifier: LogModifier): void {
    this.modifiers.set(name, modifier);
  }

  get(name: string): LogModifier | undefined {
    if (!name) return undefined;
    return this.modifiers.get(name);
  }

  names(): string[] {
    return [...this.modifiers.keys()];
  }

  /** 미등록 이름은 항등 변환. 모디파이어가 throw 해도 원본을 돌려준다. */
  apply(name: string, line: Buffer): Buffer {
    const modifier = this.get(name);
    if (!modifier) return line;
    try {
      return modifier.modify(line);
    } catch (e) {
      log.warn(`modifier "${name}" threw, passing line through`, e);
      return line;
    }
  }
}
