/**
 * Error presentation layer for surfacing actionable errors on the console.
 *
 * Maps TypedError codes to user-facing presentations with severity levels,
 * plain-language messages, retry affordances, and suggested actions.
 */

import { TypedError } from './errors';

/** Severity levels for error presentation. */
export type ErrorSeverity = 'info' | 'warning' | 'error';

/** User-facing error presentation. */
export interface ErrorPresentation {
  severity: ErrorSeverity;
  /** Short, user-friendly error title. */
  title: string;
  /** User-facing explanation of what went wrong. */
  userMessage: string;
  /** Whether offering a retry makes sense. */
  retryable: boolean;
  suggestedActions: string[];
  /** Original TypedError code for programmatic handling. */
  errorCode: string;
}

/**
 * Rule for mapping a TypedError code pattern to a presentation.
 *
 * Code patterns support prefix matching: 'IO' matches 'IO.FILE_APPEND',
 * 'IO.CLIPBOARD', etc.
 */
export interface ErrorPresentationRule {
  codePrefix: string;
  severity: ErrorSeverity;
  titleTemplate: string;
  /** Template for the user-facing message. May use {message}, {code}. */
  messageTemplate: string;
  /** If undefined, inherits from TypedError.retryable. */
  retryable?: boolean;
  suggestedActions: string[];
}

/** Built-in error presentation rules, ordered from most specific to least. */
export const DEFAULT_ERROR_PRESENTATION_RULES: ErrorPresentationRule[] = [
  {
    codePrefix: 'GENERATION.DISPLAY_NAME_EXHAUSTED',
    severity: 'warning',
    titleTemplate: 'Display Name Not Generated',
    messageTemplate: 'Could not build a display name that fits the form rules. {message}.',
    suggestedActions: ['Retry generation'],
  },
  {
    codePrefix: 'GENERATION',
    severity: 'error',
    titleTemplate: 'Generation Failed',
    messageTemplate: '{message}',
    suggestedActions: ['Retry generation'],
  },
  {
    codePrefix: 'IO.FILE_APPEND',
    severity: 'warning',
    titleTemplate: 'Record Not Saved',
    messageTemplate: '{message}. Earlier records are untouched.',
    suggestedActions: ['Copy the details from the screen before closing'],
  },
  {
    codePrefix: 'IO.CLIPBOARD',
    severity: 'warning',
    titleTemplate: 'Clipboard Unavailable',
    messageTemplate: '{message}. Values will be printed only.',
    retryable: false,
    suggestedActions: ['Copy each value manually from the screen'],
  },
  {
    codePrefix: 'CONFIG',
    severity: 'error',
    titleTemplate: 'Configuration Error',
    messageTemplate: '{message}',
    retryable: false,
    suggestedActions: ['Review the environment variables'],
  },
  {
    codePrefix: 'VALIDATION.EMAIL',
    severity: 'warning',
    titleTemplate: 'Email Rejected',
    messageTemplate: '{message}',
    retryable: true,
    suggestedActions: [],
  },
  {
    codePrefix: 'VALIDATION',
    severity: 'error',
    titleTemplate: 'Validation Error',
    messageTemplate: '{message}',
    retryable: false,
    suggestedActions: [],
  },
];

/**
 * Present a TypedError as a user-facing ErrorPresentation.
 *
 * Matches the error code against the rules (first match wins),
 * interpolates template variables, and appends fix descriptions.
 */
export function presentError(
  error: TypedError,
  rules: ErrorPresentationRule[] = DEFAULT_ERROR_PRESENTATION_RULES,
): ErrorPresentation {
  const rule = rules.find((r) => error.code.startsWith(r.codePrefix));
  const fixActions = error.suggestedFixes.map((f) => f.description ?? `Apply fix: ${f.type}`);

  if (rule) {
    return {
      severity: rule.severity,
      title: interpolate(rule.titleTemplate, error),
      userMessage: interpolate(rule.messageTemplate, error),
      retryable: rule.retryable ?? error.retryable,
      suggestedActions: dedupe([...rule.suggestedActions, ...fixActions]),
      errorCode: error.code,
    };
  }

  // Fallback for unmatched error codes
  return {
    severity: 'error',
    title: 'Error',
    userMessage: error.message,
    retryable: error.retryable,
    suggestedActions: fixActions,
    errorCode: error.code,
  };
}

const SEVERITY_MARKERS: Record<ErrorSeverity, string> = {
  info: 'i',
  warning: '!',
  error: 'x',
};

/** Render a presentation as console lines. */
export function formatPresentation(presentation: ErrorPresentation): string {
  const lines = [
    `[${SEVERITY_MARKERS[presentation.severity]}] ${presentation.title}: ${presentation.userMessage}`,
  ];
  for (const action of presentation.suggestedActions) {
    lines.push(`    - ${action}`);
  }
  return lines.join('\n');
}

function interpolate(template: string, error: TypedError): string {
  return template
    .replace(/\{message\}/g, error.message)
    .replace(/\{code\}/g, error.code);
}

function dedupe(items: string[]): string[] {
  return Array.from(new Set(items));
}
