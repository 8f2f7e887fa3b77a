import type { PingInput } from '../schemas.js';
import { type ToolHandler, textResult } from '../context.js';

export const PING_TOOL_NAME = 'ping';
export const PING_TOOL_DESCRIPTION =
  'Liveness check. Echoes the optional message, or replies "pong".';

export const pingToolHandler: ToolHandler<PingInput> = async (input) =>
  textResult(input.message ?? 'pong');
