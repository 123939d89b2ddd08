/**
 * Agent Card Route
 * Public description of the agent, its skill and how to authorize
 */

import { Hono } from 'hono';

import { AGENT_DESCRIPTION } from '@/orchestrator/prompt-builder.js';

export const OAUTH_SCHEME_NAME = 'CalendarGoogleOAuth';

const CALENDAR_SCOPE = 'https://www.googleapis.com/auth/calendar';

interface AgentCardConfig {
  agentId: string;
  agentName: string;
  /** Public base URL of this server */
  appUrl: string;
  version?: string;
}

export function buildAgentCard(config: AgentCardConfig) {
  return {
    name: config.agentName,
    description: AGENT_DESCRIPTION,
    url: config.appUrl,
    version: config.version ?? '1.0.0',
    defaultInputModes: ['text'],
    defaultOutputModes: ['text'],
    capabilities: { streaming: true },
    skills: [
      {
        id: config.agentId,
        name: 'Calendar Skill',
        description:
          'A skill for retrieving calendar events and reminders for today.',
        tags: ['calendar', 'events', 'reminders', 'schedule'],
        examples: [
          'tell me my events today',
          "what's on my calendar today",
          'summarize my reminders today',
          "show me today's schedule",
        ],
      },
    ],
    securitySchemes: {
      [OAUTH_SCHEME_NAME]: {
        type: 'oauth2',
        description: 'OAuth2 for Google Calendar API',
        flows: {
          authorizationCode: {
            authorizationUrl: `${config.appUrl}/authorize`,
            tokenUrl: `${config.appUrl}/token`,
            scopes: { [CALENDAR_SCOPE]: 'Access Google Calendar' },
          },
        },
      },
    },
    security: [{ [OAUTH_SCHEME_NAME]: [CALENDAR_SCOPE] }],
  };
}

/**
 * Create agent card routes
 */
export function createAgentCardRoutes(config: AgentCardConfig): Hono {
  const app = new Hono();
  const card = buildAgentCard(config);

  /**
   * GET /.well-known/agent.json
   */
  app.get('/.well-known/agent.json', (c) => c.json(card));

  return app;
}
