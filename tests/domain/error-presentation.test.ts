import {
  formatPresentation,
  presentError,
  DEFAULT_ERROR_PRESENTATION_RULES,
} from '../../src/domain/error-presentation';
import {
  clipboardError,
  invalidEmailError,
  configValueError,
  createTypedError,
  displayNameExhaustedError,
  fileAppendError,
} from '../../src/domain/errors';

describe('presentError', () => {
  it('maps display name exhaustion to a retryable warning', () => {
    const presentation = presentError(displayNameExhaustedError(8));

    expect(presentation.severity).toBe('warning');
    expect(presentation.title).toBe('Display Name Not Generated');
    expect(presentation.userMessage).toBe(
      'Could not build a display name that fits the form rules. No valid display name found after 8 attempts.',
    );
    expect(presentation.retryable).toBe(true);
    expect(presentation.suggestedActions).toEqual([
      'Retry generation',
      'Retry generation with fresh random names',
      'Raise the display name attempt budget',
    ]);
    expect(presentation.errorCode).toBe('GENERATION.DISPLAY_NAME_EXHAUSTED');
  });

  it('maps file append failures to a warning that keeps earlier records', () => {
    const presentation = presentError(fileAppendError('out.txt', new Error('disk full')));

    expect(presentation.title).toBe('Record Not Saved');
    expect(presentation.userMessage).toBe('Could not write to out.txt: disk full. Earlier records are untouched.');
  });

  it('forces clipboard errors to be non-retryable', () => {
    const presentation = presentError(clipboardError(new Error('no xclip')));
    expect(presentation.retryable).toBe(false);
    expect(presentation.title).toBe('Clipboard Unavailable');
  });

  it('maps CONFIG errors to configuration errors', () => {
    const presentation = presentError(configValueError('PASSWORD_LENGTH', 'x', 'an integer'));
    expect(presentation.severity).toBe('error');
    expect(presentation.title).toBe('Configuration Error');
  });

  it('falls back for unknown codes', () => {
    const error = createTypedError({
      code: 'UNKNOWN.THING',
      message: 'odd',
      suggestedFixes: [{ type: 'DO_IT', params: {} }],
    });
    const presentation = presentError(error);

    expect(presentation.title).toBe('Error');
    expect(presentation.userMessage).toBe('odd');
    expect(presentation.suggestedActions).toEqual(['Apply fix: DO_IT']);
  });

  it('accepts custom rules', () => {
    const presentation = presentError(createTypedError({ code: 'IO.FILE_APPEND', message: 'm' }), [
      { codePrefix: 'IO', severity: 'info', titleTemplate: 'T {code}', messageTemplate: 'M {message}', suggestedActions: [] },
    ]);
    expect(presentation.title).toBe('T IO.FILE_APPEND');
    expect(presentation.userMessage).toBe('M m');
    expect(presentation.severity).toBe('info');
  });

  it('orders specific generation rules before the generic one', () => {
    const prefixes = DEFAULT_ERROR_PRESENTATION_RULES.map((r) => r.codePrefix);
    expect(prefixes.indexOf('GENERATION.DISPLAY_NAME_EXHAUSTED')).toBeLessThan(prefixes.indexOf('GENERATION'));
    expect(prefixes.indexOf('VALIDATION.EMAIL')).toBeLessThan(prefixes.indexOf('VALIDATION'));
  });

  it('presents a rejected email as a retryable warning', () => {
    const presentation = presentError(invalidEmailError('nope'));

    expect(presentation.severity).toBe('warning');
    expect(presentation.title).toBe('Email Rejected');
    expect(presentation.retryable).toBe(true);
    expect(presentation.suggestedActions).toEqual(['Paste the full address shown by the temp-mail page']);
  });
});

describe('formatPresentation', () => {
  it('renders a title line and one line per action', () => {
    const text = formatPresentation({
      severity: 'error',
      title: 'Broken',
      userMessage: 'It broke',
      retryable: false,
      suggestedActions: ['Fix it', 'Try again'],
      errorCode: 'X',
    });

    expect(text).toBe('[x] Broken: It broke\n    - Fix it\n    - Try again');
  });

  it('renders a single line when there are no actions', () => {
    const text = formatPresentation({
      severity: 'info',
      title: 'Note',
      userMessage: 'fyi',
      retryable: false,
      suggestedActions: [],
      errorCode: 'X',
    });

    expect(text).toBe('[i] Note: fyi');
  });
});
