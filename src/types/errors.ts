export const ErrorCodes = {
  // Request and payload (1xxx)
  INVALID_ARGUMENT: 1001,
  DECODE_ERROR: 1002,

  // Policy (2xxx)
  BLOCKED_PROMPT: 2001,
  BLOCKED_CANDIDATE: 2002,

  // Transport (4xxx)
  TRANSPORT_ERROR: 4001,
  CONNECTION_TIMEOUT: 4002,
  HTTP_ERROR: 4003,
  WEBSOCKET_ERROR: 4004,

  // System (5xxx)
  INTERNAL_ERROR: 5001,
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

export interface GenAIErrorData {
  code: number;
  message: string;
  data?: Record<string, unknown>;
}
