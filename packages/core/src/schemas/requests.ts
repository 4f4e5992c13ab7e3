import { z } from 'zod';
import { type SessionState } from '../entities/session';
import { isSessionState } from '../utils/json';

export const sessionStateSchema = z.custom<SessionState>(isSessionState, {
  message: 'state must be an object holding only JSON values (string, number, boolean, null, array, plain object)',
});

export const createSessionRequestSchema = z.object({
  agentId: z.string().trim().min(1, 'agentId must not be empty'),
  state: sessionStateSchema,
});

export const sendMessageRequestSchema = z.object({
  sessionId: z.string().trim().min(1, 'sessionId must not be empty'),
  text: z.string({ invalid_type_error: 'text must be a string' }),
});

export const sessionIdSchema = z.string().trim().min(1, 'sessionId must not be empty');

export type CreateSessionRequest = z.infer<typeof createSessionRequestSchema>;
export type SendMessageRequest = z.infer<typeof sendMessageRequestSchema>;

/** Joins zod issues into one line: `path: message; path: message`. */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
