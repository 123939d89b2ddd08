/**
 * Test Fixtures
 * Reusable calendar data for consistent testing
 */

import type { TaskMessage } from '@/types/index.js';

export const todayEvents = {
  events: [
    {
      summary: 'Team standup',
      start: '2026-03-02T09:30:00Z',
      end: '2026-03-02T09:45:00Z',
    },
    {
      summary: 'Dentist',
      start: '2026-03-02T15:00:00Z',
      end: '2026-03-02T16:00:00Z',
    },
  ],
};

export const listEventsTool = {
  name: 'list_events',
  description: "List today's calendar events",
  inputSchema: {
    type: 'object',
    properties: { day: { type: 'string' } },
  },
};

export function userMessage(text: string, messageId = 'msg-1'): TaskMessage {
  return {
    messageId,
    role: 'user',
    parts: [{ kind: 'text', text }],
  };
}
