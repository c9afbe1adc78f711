import {
  ILLEGAL_ACTION_REASON_MESSAGES,
  PROTOCOL_VIOLATION_REASON_MESSAGES,
} from './runtime-reasons.js';
import type { CatalogIntegrityReason, IllegalActionReason, ProtocolViolationReason } from './runtime-reasons.js';
import type { ChoiceKind, ChoiceOption } from './types.js';

export type KernelRuntimeErrorCode =
  | 'ILLEGAL_ACTION'
  | 'PROTOCOL_VIOLATION'
  | 'CATALOG_INTEGRITY'
  | 'GAME_CONFIG_INVALID'
  | 'CENTER_TRIGGER_LIMIT_EXCEEDED'
  | 'CHOICE_WITHOUT_OPTIONS'
  | 'STATE_INVARIANT_VIOLATED';

export type ErrorSurface = 'applyAction' | 'applyDraw' | 'resolveChoice';

export interface KernelRuntimeErrorContextByCode {
  readonly ILLEGAL_ACTION: Readonly<{
    readonly surface: ErrorSurface;
    readonly reason: IllegalActionReason;
    readonly metadata?: Readonly<Record<string, unknown>>;
  }>;
  readonly PROTOCOL_VIOLATION: Readonly<{
    readonly surface: ErrorSurface;
    readonly reason: ProtocolViolationReason;
    readonly option?: ChoiceOption;
    readonly expectedKind?: ChoiceKind;
  }>;
  readonly CATALOG_INTEGRITY: Readonly<{
    readonly reason: CatalogIntegrityReason;
    readonly names?: readonly string[];
    readonly issues?: readonly string[];
    readonly assetPath?: string;
  }>;
  readonly GAME_CONFIG_INVALID: Readonly<{
    readonly issues: readonly string[];
  }>;
  readonly CENTER_TRIGGER_LIMIT_EXCEEDED: Readonly<{
    readonly limit: number;
    readonly turn: number;
  }>;
  readonly CHOICE_WITHOUT_OPTIONS: Readonly<{
    readonly kind: ChoiceKind;
  }>;
  readonly STATE_INVARIANT_VIOLATED: Readonly<{
    readonly invariant: string;
  }>;
}

export type KernelRuntimeErrorContext<C extends KernelRuntimeErrorCode = KernelRuntimeErrorCode> =
  KernelRuntimeErrorContextByCode[C];

function formatMessage<C extends KernelRuntimeErrorCode>(message: string, context?: KernelRuntimeErrorContext<C>): string {
  if (context === undefined) {
    return message;
  }
  return `${message} context=${JSON.stringify(context)}`;
}

export class KernelRuntimeError<C extends KernelRuntimeErrorCode = KernelRuntimeErrorCode> extends Error {
  readonly code: C;
  readonly context?: KernelRuntimeErrorContext<C>;

  constructor(code: C, message: string, context?: KernelRuntimeErrorContext<C>, cause?: unknown) {
    super(formatMessage(message, context), cause === undefined ? undefined : { cause });
    this.name = 'KernelRuntimeError';
    this.code = code;
    if (context !== undefined) {
      this.context = context;
    }
  }
}

export const kernelRuntimeError = <C extends KernelRuntimeErrorCode>(
  code: C,
  message: string,
  context?: KernelRuntimeErrorContext<C>,
  cause?: unknown,
): KernelRuntimeError<C> => new KernelRuntimeError(code, message, context, cause);

export class IllegalActionError extends KernelRuntimeError<'ILLEGAL_ACTION'> {
  readonly reason: IllegalActionReason;

  constructor(surface: ErrorSurface, reason: IllegalActionReason, metadata?: Readonly<Record<string, unknown>>) {
    super('ILLEGAL_ACTION', `Illegal action: ${surface} reason=${reason} detail=${ILLEGAL_ACTION_REASON_MESSAGES[reason]}`, {
      surface,
      reason,
      ...(metadata === undefined ? {} : { metadata }),
    });
    this.name = 'IllegalActionError';
    this.reason = reason;
  }
}

export const illegalActionError = (
  surface: ErrorSurface,
  reason: IllegalActionReason,
  metadata?: Readonly<Record<string, unknown>>,
): IllegalActionError => new IllegalActionError(surface, reason, metadata);

export class ProtocolViolationError extends KernelRuntimeError<'PROTOCOL_VIOLATION'> {
  readonly reason: ProtocolViolationReason;

  constructor(surface: ErrorSurface, reason: ProtocolViolationReason, option?: ChoiceOption, expectedKind?: ChoiceKind) {
    super(
      'PROTOCOL_VIOLATION',
      `Protocol violation: ${surface} reason=${reason} detail=${PROTOCOL_VIOLATION_REASON_MESSAGES[reason]}`,
      {
        surface,
        reason,
        ...(option === undefined ? {} : { option }),
        ...(expectedKind === undefined ? {} : { expectedKind }),
      },
    );
    this.name = 'ProtocolViolationError';
    this.reason = reason;
  }
}

export const protocolViolationError = (
  surface: ErrorSurface,
  reason: ProtocolViolationReason,
  option?: ChoiceOption,
  expectedKind?: ChoiceKind,
): ProtocolViolationError => new ProtocolViolationError(surface, reason, option, expectedKind);

export class CatalogIntegrityError extends KernelRuntimeError<'CATALOG_INTEGRITY'> {
  readonly reason: CatalogIntegrityReason;

  constructor(message: string, context: KernelRuntimeErrorContext<'CATALOG_INTEGRITY'>, cause?: unknown) {
    super('CATALOG_INTEGRITY', message, context, cause);
    this.name = 'CatalogIntegrityError';
    this.reason = context.reason;
  }
}

export const catalogIntegrityError = (
  message: string,
  context: KernelRuntimeErrorContext<'CATALOG_INTEGRITY'>,
  cause?: unknown,
): CatalogIntegrityError => new CatalogIntegrityError(message, context, cause);

export const stateInvariantError = (invariant: string): KernelRuntimeError<'STATE_INVARIANT_VIOLATED'> =>
  new KernelRuntimeError('STATE_INVARIANT_VIOLATED', `state invariant violated: ${invariant}`, { invariant });

export function isKernelRuntimeError(error: unknown): error is KernelRuntimeError {
  return error instanceof KernelRuntimeError;
}

export function isKernelErrorCode<C extends KernelRuntimeErrorCode>(
  error: unknown,
  code: C,
): error is KernelRuntimeError<C> {
  return isKernelRuntimeError(error) && error.code === code;
}
