// === src/core/logging/perf.ts ===
import { LOG_TOTAL_CALLS_THRESHOLD } from '../../shared/const.js';

export function perfNow() {
  const [s, ns] = process.hrtime();
  return s * 1e3 + ns / 1e6;
}

export interface FunctionCall {
  name: string;
  start: number;
  duration: number;
}

export interface FunctionStats {
  count: number;
  totalTime: number;
  avgTime: number;
  maxTime: number;
}

export interface CaptureResult {
  duration: number;
  functionCalls: FunctionCall[];
  functionSummary: Record<string, FunctionStats>;
  heapDelta: number;
  insights: string[];
}

export class PerformanceProfiler {
  private functionCalls: FunctionCall[] = [];
  private isEnabled = false;
  private isCapturing = false;
  private startTime = 0;
  private startHeap = 0;

  public enable() {
    this.isEnabled = true;
  }

  public disable() {
    this.isEnabled = false;
    this.isCapturing = false;
  }

  /** 외부에서 OFF/ON 빠른 분기용 (측정 오버헤드 최소화) */
  public isOn(): boolean { return this.isEnabled; }

  public recordFunctionCall(name: string, start: number, duration: number) {
    if (!this.isEnabled) return;
    this.functionCalls.push({ name, start, duration });
  }

  public startCapture() {
    if (this.isCapturing || !this.isEnabled) return;
    this.isCapturing = true;
    this.functionCalls = [];
    this.startTime = perfNow();
    this.startHeap = process.memoryUsage().heapUsed;
  }

  public stopCapture(): CaptureResult {
    const duration = this.isCapturing ? perfNow() - this.startTime : 0;
    const heapDelta = this.isCapturing ? process.memoryUsage().heapUsed - this.startHeap : 0;
    this.isCapturing = false;
    const functionCalls = this.functionCalls;
    this.functionCalls = [];
    const functionSummary = summarize(functionCalls);
    return {
      duration,
      functionCalls,
      functionSummary,
      heapDelta,
      insights: this.generateInsights(functionSummary),
    };
  }

  private generateInsights(functionSummary: Record<string, FunctionStats>): string[] {
    const insights: string[] = [];
    const totalCalls = Object.values(functionSummary).reduce((sum, s) => sum + s.count, 0);
    if (totalCalls > LOG_TOTAL_CALLS_THRESHOLD) {
      insights.push('함수 호출 수가 많음 - 캐싱 고려');
    }
    const slow = Object.entries(functionSummary)
      .filter(([, s]) => s.maxTime > 100)
      .map(([name]) => name);
    if (slow.length) insights.push(`100ms 초과 호출: ${slow.join(', ')}`);
    return insights;
  }
}

function summarize(calls: FunctionCall[]): Record<string, FunctionStats> {
  const out: Record<string, FunctionStats> = {};
  for (const c of calls) {
    const s = out[c.name] ?? { count: 0, totalTime: 0, avgTime: 0, maxTime: 0 };
    s.count++;
    s.totalTime += c.duration;
    s.maxTime = Math.max(s.maxTime, c.duration);
    s.avgTime = s.totalTime / s.count;
    out[c.name] = s;
  }
  return out;
}

export const globalProfiler = new PerformanceProfiler();

// Decorator for class methods (동기 메서드 전용)
export function measure(name?: string) {
  return function (_target: object, propertyKey: string, descriptor: PropertyDescriptor) {
    const originalMethod: unknown = descriptor.value;
    if (typeof originalMethod !== 'function') return descriptor;
    const funcName = name || propertyKey;
    descriptor.value = function (this: unknown, ...args: unknown[]) {
      // 🔴 OFF: 측정 없이 즉시 원본 실행 → 타이머 호출 0회
      if (!globalProfiler.isOn()) return originalMethod.apply(this, args);
      // 🟢 ON: 타이머 & 기록
      const t0 = perfNow();
      try { return originalMethod.apply(this, args); }
      finally { globalProfiler.recordFunctionCall(funcName, t0, perfNow() - t0); }
    };
    return descriptor;
  };
}

/** 호출부에서 블록 단위로 계측 */
export function measureBlock<T>(name: string, fn: () => T): T {
  if (!globalProfiler.isOn()) return fn();
  const t0 = perfNow();
  try {
    return fn();
  } finally {
    globalProfiler.recordFunctionCall(name, t0, perfNow() - t0);
  }
}
