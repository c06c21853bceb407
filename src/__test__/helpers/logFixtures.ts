import { LogItem, type LogItemInit } from '../../core/logs/LogItem.js';
import { LogItems, type LogItemsOptions } from '../../core/logs/LogItems.js';

const ESC = '\u001b';

/** chalk(level 2) ansi256 출력과 같은 모양의 기대값 */
export function paint(text: string, code: number): string {
  return `${ESC}[38;5;${code}m${text}${ESC}[39m`;
}

export function item(message: string, init: Omit<LogItemInit, 'bytes'> = {}): LogItem {
  return new LogItem({ timestamp: 'T', ...init, bytes: Buffer.from(message, 'utf8') });
}

/** 접두어 없는(pod/container 비움) 메시지만으로 컬렉션 구성 */
export function itemsOf(messages: string[], opts: LogItemsOptions = {}): LogItems {
  return new LogItems(messages.map((m) => item(m)), opts);
}

export const text = (b: Buffer) => b.toString('utf8');
