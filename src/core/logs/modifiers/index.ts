import { ZAP_PRETTY_MODIFIER } from '../../../shared/const.js';
import { type LogModifier, ModifierRegistry } from '../LogModifier.js';
import { ZapPrettyModifier } from './ZapPrettyModifier.js';

export { ZapPrettyModifier } from './ZapPrettyModifier.js';

/** 프로세스 기본 레지스트리 — 모듈 로드 시 내장 모디파이어를 채운다 */
export const defaultModifiers = new ModifierRegistry();
defaultModifiers.register(ZAP_PRETTY_MODIFIER, new ZapPrettyModifier());

/** 기본 레지스트리에 등록. 렌더 시작 전에 호출할 것. */
export function registerLogModifier(name: string, modifier: LogModifier): void {
  defaultModifiers.register(name, modifier);
}
