// === src/core/config/schema.ts ===
import { z } from 'zod';

import { ENV_MODIFIER, ENV_SHOW_TIME, ENV_SINGLE_CONTAINER, NO_MODIFIER } from '../../shared/const.js';
import { ErrorCategory, XError } from '../../shared/errors.js';

/* ─────────────────────────────────────────────────────────────
 * 뷰 설정
 *  - showTime        : 타임스탬프 컬럼 표시
 *  - modifier        : 렌더 후처리 모디파이어 이름("" = 없음)
 *  - singleContainer : 단일 컨테이너 모드(컨테이너 컬럼 생략)
 * ───────────────────────────────────────────────────────────── */
export const ViewConfigSchema = z.object({
  showTime: z.boolean().default(false),
  modifier: z.string().default(NO_MODIFIER),
  singleContainer: z.boolean().default(false),
});

export type ViewConfig = z.infer<typeof ViewConfigSchema>;
export type ViewConfigInput = z.input<typeof ViewConfigSchema>;

export const defaultViewConfig: ViewConfig = ViewConfigSchema.parse({});

const TRUTHY: readonly string[] = ['1', 'true', 'yes', 'on'];

// "1" | "true" | "yes" | "on" → true, "0" | "false" | "no" | "off" → false
const BoolFlag = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(z.enum(['1', 'true', 'yes', 'on', '0', 'false', 'no', 'off']))
  .transform((v) => TRUTHY.includes(v));

const EnvSchema = z.object({
  [ENV_SHOW_TIME]: BoolFlag.optional(),
  [ENV_MODIFIER]: z.string().trim().optional(),
  [ENV_SINGLE_CONTAINER]: BoolFlag.optional(),
});

function describeIssues(e: z.ZodError): string {
  return e.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
}

/** 객체 입력 검증(누락 필드는 기본값) */
export function parseViewConfig(input: ViewConfigInput = {}): ViewConfig {
  const r = ViewConfigSchema.safeParse(input);
  if (!r.success) {
    throw new XError(ErrorCategory.Config, `invalid view config: ${describeIssues(r.error)}`, r.error.issues);
  }
  return r.data;
}

/** 환경변수 → 뷰 설정. 잘못된 값이면 XError(Config) */
export function loadViewConfig(env: NodeJS.ProcessEnv = process.env): ViewConfig {
  const r = EnvSchema.safeParse(env);
  if (!r.success) {
    throw new XError(ErrorCategory.Config, `invalid environment: ${describeIssues(r.error)}`, r.error.issues);
  }
  return parseViewConfig({
    showTime: r.data[ENV_SHOW_TIME],
    modifier: r.data[ENV_MODIFIER],
    singleContainer: r.data[ENV_SINGLE_CONTAINER],
  });
}
