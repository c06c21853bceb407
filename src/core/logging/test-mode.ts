/**
 * npm run test / 테스트 러너 환경 감지.
 * - npm_lifecycle_event === 'test'
 * - NODE_ENV === 'test'
 * - 제스트 런타임 힌트(JEST_WORKER_ID)
 * - 강제 스위치: LOGVIEW_LOG_TO_CONSOLE=1 → 테스트 중에도 콘솔 출력
 */
export function isTestMode(): boolean {
  if (process.env.LOGVIEW_LOG_TO_CONSOLE === '1') return false;
  const ev = (process.env.npm_lifecycle_event || '').toLowerCase();
  return ev === 'test' || process.env.NODE_ENV === 'test' || !!process.env.JEST_WORKER_ID;
}
