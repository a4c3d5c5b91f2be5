import type { ActionError, ActionErrorCode } from './types';

/**
 * Base class for the failures the calculation pipeline reports.
 * `userMessage` is shown in the UI as-is; `message` is for logs.
 */
export class CatDietError extends Error {
  readonly code: ActionErrorCode;
  readonly userMessage: string;

  constructor(code: ActionErrorCode, message: string, userMessage: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.userMessage = userMessage;
  }
}

export class InvalidInputError extends CatDietError {
  constructor(message: string, userMessage: string) {
    super('invalid_input', message, userMessage);
  }
}

export class PreconditionError extends CatDietError {
  constructor(message: string, userMessage: string) {
    super('precondition_failed', message, userMessage);
  }
}

export class AssetMissingError extends CatDietError {
  readonly assetPath: string;

  constructor(assetPath: string, userMessage: string) {
    super('asset_missing', `Report asset not found: ${assetPath}`, userMessage);
    this.assetPath = assetPath;
  }
}

/**
 * Convert anything thrown inside a step into the ActionError shape the UI renders.
 */
export function toActionError(error: unknown): ActionError {
  if (error instanceof CatDietError) {
    return { code: error.code, message: error.userMessage, details: error.message };
  }
  return {
    code: 'unknown_error',
    message: '發生未預期的錯誤，請稍後再試。',
    details: error instanceof Error ? error.message : String(error),
  };
}
