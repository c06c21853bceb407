/// <reference types="jest" />
import { globalProfiler } from './src/core/logging/perf.js';

const __PERF_ON__ = process.env.PERF === '1';

// ── 테스트 중에만 console.* 활성화 + CustomConsole 우회 ───────────────
// (teardown 이후 늦게 오는 로그는 무시. 허용 시에도 process.stdout/stderr로 직접 출력)
let testActive = false;

const format = (args: unknown[]) =>
  args.map((a) => (typeof a === 'string' ? a : JSON.stringify(a))).join(' ') + '\n';

function guarded(stream: NodeJS.WriteStream) {
  return (...args: unknown[]): void => {
    if (!testActive) return; // 테스트 컨텍스트 밖(tear-down 포함)에서는 드랍
    stream.write(format(args));
  };
}

console.log = guarded(process.stdout);
console.info = guarded(process.stdout);
console.debug = guarded(process.stdout);
console.warn = guarded(process.stderr);
console.error = guarded(process.stderr);

// 각 테스트 생명주기에 맞춰 on/off
beforeAll(() => { testActive = true; });
beforeEach(() => { testActive = true; });
afterEach(() => { testActive = false; });
afterAll(() => { testActive = false; });

// ── PERF=1 일 때 전역 성능 캡처 on/off + 요약 출력 ───────────────────
beforeAll(() => {
  if (!__PERF_ON__) return;
  globalProfiler.enable();
  globalProfiler.startCapture();
});

afterAll(() => {
  if (!__PERF_ON__) return;
  const { duration, functionSummary, insights } = globalProfiler.stopCapture();
  globalProfiler.disable();

  const top = Object.entries(functionSummary)
    .map(([name, s]) => ({
      name,
      calls: s.count,
      total_ms: s.totalTime.toFixed(1),
      avg_ms: s.avgTime.toFixed(2),
      max_ms: s.maxTime.toFixed(1),
    }))
    .sort((a, b) => Number(b.total_ms) - Number(a.total_ms))
    .slice(0, 15);

  testActive = true;
  console.log('\n=== PERF (node/jest) ===');
  console.log(`duration: ${duration.toFixed(1)} ms`);
  console.table(top);
  if (insights.length) console.log('insights:', insights.join(' | '));
  testActive = false;
});
