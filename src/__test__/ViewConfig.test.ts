import { defaultViewConfig, loadViewConfig, parseViewConfig } from '../core/config/schema.js';
import { ErrorCategory, isXError } from '../shared/errors.js';

describe('view config', () => {
  it('값이 없으면 기본값', () => {
    expect(loadViewConfig({})).toEqual({ showTime: false, modifier: '', singleContainer: false });
    expect(defaultViewConfig).toEqual({ showTime: false, modifier: '', singleContainer: false });
  });

  it('환경변수 boolean 표기를 관대하게 받는다', () => {
    expect(
      loadViewConfig({
        LOGVIEW_SHOW_TIME: ' Yes ',
        LOGVIEW_MODIFIER: ' zap-pretty ',
        LOGVIEW_SINGLE_CONTAINER: 'off',
      }),
    ).toEqual({ showTime: true, modifier: 'zap-pretty', singleContainer: false });
    expect(loadViewConfig({ LOGVIEW_SINGLE_CONTAINER: '1' }).singleContainer).toBe(true);
  });

  it('해석 불가한 값은 Config 에러', () => {
    let caught: unknown;
    try {
      loadViewConfig({ LOGVIEW_SHOW_TIME: 'maybe' });
    } catch (e) {
      caught = e;
    }
    expect(isXError(caught, ErrorCategory.Config)).toBe(true);
    expect(caught instanceof Error && caught.message.startsWith('invalid environment: LOGVIEW_SHOW_TIME:')).toBe(true);
  });

  it('객체 입력은 누락 필드만 기본값으로 채운다', () => {
    expect(parseViewConfig({ modifier: 'x' })).toEqual({ showTime: false, modifier: 'x', singleContainer: false });
  });
});
