import { ZAP_PRETTY_MODIFIER } from '../shared/const.js';
import { ModifierRegistry } from '../core/logs/LogModifier.js';
import { defaultModifiers, ZapPrettyModifier } from '../core/logs/modifiers/index.js';
import { text } from './helpers/logFixtures.js';

describe('ModifierRegistry', () => {
  it('등록/조회/덮어쓰기', () => {
    const reg = new ModifierRegistry();
    const a = { modify: (l: Buffer) => Buffer.from('a:' + l.toString()) };
    const b = { modify: (l: Buffer) => Buffer.from('b:' + l.toString()) };
    reg.register('x', a);
    expect(reg.get('x')).toBe(a);
    reg.register('x', b);
    expect(reg.get('x')).toBe(b);
    expect(reg.names()).toEqual(['x']);
    expect(text(reg.apply('x', Buffer.from('line')))).toBe('b:line');
  });

  it('빈 이름/미등록 이름은 항등 변환', () => {
    const reg = new ModifierRegistry();
    const line = Buffer.from('keep');
    expect(reg.get('')).toBeUndefined();
    expect(reg.apply('', line)).toBe(line);
    expect(reg.apply('missing', line)).toBe(line);
  });

  it('레지스트리끼리 상태를 공유하지 않는다', () => {
    const r1 = new ModifierRegistry();
    const r2 = new ModifierRegistry();
    r1.register('only-r1', { modify: (l) => l });
    expect(r2.get('only-r1')).toBeUndefined();
  });

  it('기본 레지스트리에는 zap-pretty가 들어 있다', () => {
    expect(defaultModifiers.get(ZAP_PRETTY_MODIFIER)).toBeInstanceOf(ZapPrettyModifier);
  });
});
