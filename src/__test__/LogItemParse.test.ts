import { LogItem } from '../core/logs/LogItem.js';
import { LogItems } from '../core/logs/LogItems.js';
import { sanitizeLine, sanitizeLineBytes } from '../core/logs/Sanitizer.js';

describe('LogItem.fromBytes', () => {
  it('첫 토큰은 timestamp, 나머지는 본문으로 분리된다', () => {
    const it1 = LogItem.fromBytes(Buffer.from('TS msg1 msg2\n'));
    expect(it1.timestamp).toBe('TS');
    expect(it1.bytes.toString()).toBe('msg1 msg2');
  });

  it('문자열 입력도 동일하게 처리한다', () => {
    const l = LogItem.fromBytes('2024-01-01T00:00:00.000Z GET /health 200\n');
    expect(l.timestamp).toBe('2024-01-01T00:00:00.000Z');
    expect(l.bytes.toString()).toBe('GET /health 200');
  });

  it('공백이 없으면 전체가 timestamp로 흡수되고 본문은 비어 있다', () => {
    const l = LogItem.fromBytes('lonely-token\n');
    expect(l.timestamp).toBe('lonely-token');
    expect(l.bytes.length).toBe(0);
    expect(l.isEmpty()).toBe(true);
  });

  it('끝 개행이 없어도 마지막 글자를 잃지 않는다', () => {
    const l = LogItem.fromBytes('TS hello');
    expect(l.bytes.toString()).toBe('hello');
  });

  it('연속 공백은 본문에 그대로 남는다', () => {
    const l = LogItem.fromBytes('TS  indented\n');
    expect(l.bytes.toString()).toBe(' indented');
  });

  it('본문에는 timestamp가 포함되지 않는다', () => {
    const l = LogItem.fromBytes('T0 a b c\n');
    expect(l.bytes.toString().startsWith('T0')).toBe(false);
  });
});

describe('LogItem 기본 동작', () => {
  it('fromString은 본문을 그대로 두고 현재 시각을 timestamp로 쓴다', () => {
    const l = LogItem.fromString('[status] reconnecting');
    expect(l.bytes.toString()).toBe('[status] reconnecting');
    expect(Number.isNaN(Date.parse(l.timestamp))).toBe(false);
  });

  it('id()는 pod 우선, 없으면 container, 둘 다 없으면 빈 문자열', () => {
    expect(new LogItem({ pod: 'p1', container: 'c1' }).id()).toBe('p1');
    expect(new LogItem({ container: 'c1' }).id()).toBe('c1');
    expect(new LogItem().id()).toBe('');
  });

  it('info()는 pod/container를 따옴표로 감싼다', () => {
    expect(new LogItem({ pod: 'p1', container: 'c1' }).info()).toBe('"p1"::"c1"');
  });

  it('clone()은 필드는 같고 바이트 버퍼는 독립적이다', () => {
    const orig = new LogItem({
      pod: 'p1',
      container: 'c1',
      timestamp: 'TS',
      singleContainer: true,
      bytes: Buffer.from('hello'),
    });
    const copy = orig.clone();
    expect(copy).toEqual(orig);
    expect(copy.bytes).not.toBe(orig.bytes);

    copy.bytes[0] = 0x4a; // 'J'
    expect(copy.bytes.toString()).toBe('Jello');
    expect(orig.bytes.toString()).toBe('hello');
  });
});

describe('LogItems.parse', () => {
  it('청크를 라인별 레코드로 만들고 출처를 찍는다', () => {
    const got = LogItems.parse('T1 a\r\nT2 b\n\nT3\n', { pod: 'p1', container: 'c1' });
    expect(got.map((l) => [l.timestamp, l.bytes.toString()])).toEqual([
      ['T1', 'a'],
      ['T2', 'b'],
      ['T3', ''],
    ]);
    expect(got.every((l) => l.pod === 'p1' && l.container === 'c1' && !l.singleContainer)).toBe(true);
  });

  it('청크 선두 BOM과 라인 중간 BOM을 제거한다', () => {
    const got = LogItems.parse(Buffer.from('\uFEFFT1 a\uFEFFb\n', 'utf8'));
    expect(got).toHaveLength(1);
    expect(got[0].timestamp).toBe('T1');
    expect(got[0].bytes.toString()).toBe('ab');
  });

  it('UTF-8이 아닌 바이트도 그대로 보존한다', () => {
    const got = LogItems.parse(Buffer.from([0x54, 0x20, 0xff, 0x0a]));
    expect(got).toHaveLength(1);
    expect(got[0].timestamp).toBe('T');
    expect([...got[0].bytes]).toEqual([0xff]);
    expect([...LogItem.fromBytes(Buffer.from([0x54, 0x20, 0xff, 0x0a])).bytes]).toEqual([0xff]);
  });

  it('sanitizeLineBytes: CR/BOM만 빼고 나머지 바이트는 비트 단위로 유지', () => {
    const line = Buffer.from([0x61, 0xef, 0xbb, 0xbf, 0xfe, 0x80, 0x0d]);
    expect([...sanitizeLineBytes(line)]).toEqual([0x61, 0xfe, 0x80]);
  });

  it('sanitizeLine 옵션: 제어문자 제거는 켤 때만 적용된다', () => {
    expect(sanitizeLine('a\u0007b\r')).toBe('a\u0007b');
    expect(sanitizeLine('a\u0007b\tc', { dropControlExceptTab: true })).toBe('ab\tc');
  });
});

describe('LogItems 컬렉션', () => {
  it('push/get/length/toArray/iteration/clear', () => {
    const items = new LogItems();
    expect(items.push(...LogItems.parse('T1 a\nT2 b\n'))).toBe(2);
    expect(items.length).toBe(2);
    expect(items.get(1)?.bytes.toString()).toBe('b');
    expect(items.get(5)).toBeUndefined();
    expect([...items].map((l) => l.timestamp)).toEqual(['T1', 'T2']);

    const snapshot = items.toArray();
    items.clear();
    expect(items.length).toBe(0);
    expect(snapshot).toHaveLength(2);
  });

  it('lines/strLines는 중립 색상으로 렌더한다', () => {
    const items = new LogItems(LogItems.parse('T1 a\n', { pod: 'p' }));
    expect(items.strLines(false, '')).toEqual(['\u001b[38;5;0mp\u001b[39m:a']);
    expect(items.lines(false, '')[0].toString()).toBe('\u001b[38;5;0mp\u001b[39m:a');
  });
});
