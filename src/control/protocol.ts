/**
 * Control Layer Protocol Constants
 *
 * Error codes, wire text and defaults shared by controllers,
 * receivers and the session registry.
 *
 * @module control/protocol
 */

/**
 * Default ratio between dedup window capacity and active member count
 */
export const DEFAULT_WINDOW_FACTOR = 1.5;

/**
 * Error codes for standardized error handling
 */
export enum ErrorCode {
  // Session errors (1xxx)
  DUPLICATE_SESSION = 1001,
  UNKNOWN_SESSION = 1002,

  // Queue errors (2xxx)
  EMPTY_QUEUE = 2001,

  // Composition errors (3xxx)
  INVALID_CONTROLLER = 3001,
  INVALID_MEMBER = 3002,

  // Entity errors (4xxx)
  UNKNOWN_COMMAND = 4001,

  // Configuration errors (5xxx)
  INVALID_CONFIG = 5001,
}

/**
 * Error code to human-readable message mapping
 */
export const ERROR_MESSAGES: Record<ErrorCode, string> = {
  [ErrorCode.DUPLICATE_SESSION]: 'Session ID already taken',
  [ErrorCode.UNKNOWN_SESSION]: 'No player registered under session ID',
  [ErrorCode.EMPTY_QUEUE]: 'No command queued',
  [ErrorCode.INVALID_CONTROLLER]: 'Argument is not a Controller',
  [ErrorCode.INVALID_MEMBER]: 'Argument is not a Receiver',
  [ErrorCode.UNKNOWN_COMMAND]: 'Command not recognized',
  [ErrorCode.INVALID_CONFIG]: 'Invalid configuration',
};

/**
 * Create a standardized error record
 */
export function createError(code: ErrorCode, details?: string): {
  code: ErrorCode;
  message: string;
  details?: string;
} {
  return {
    code,
    message: ERROR_MESSAGES[code],
    details,
  };
}

/**
 * Error thrown by the control layer. The message is the details when
 * given, the generic text for the code otherwise.
 */
export class ControlError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, details?: string) {
    super(details ?? ERROR_MESSAGES[code]);
    this.name = 'ControlError';
    this.code = code;
  }

  toJSON(): ReturnType<typeof createError> {
    return createError(this.code, this.message);
  }
}

/**
 * Header line written before the first message of a new speaker
 */
export function formatSpeakerHeader(member: unknown): string {
  return `[${String(member)}]`;
}

/**
 * Notice written when a member was taken over by another controller
 */
export function formatLostConnection(member: unknown): string {
  return `Lost connection with ${String(member)}`;
}
