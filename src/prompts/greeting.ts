import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';

const STYLES: Record<string, string> = {
  friendly: 'Please write a warm, friendly greeting',
  formal: 'Please write a formal, professional greeting',
  casual: 'Please write a casual, relaxed greeting'
};

/**
 * Builds the greeting instruction; unknown styles fall back to friendly
 */
export function greetingPrompt(name: string, style = 'friendly'): string {
  const lead = Object.prototype.hasOwnProperty.call(STYLES, style) ? STYLES[style] : STYLES.friendly;
  return `${lead} for someone named ${name}.`;
}

export function registerGreetingPrompt(server: McpServer) {
  server.registerPrompt(
    'greet_user',
    {
      title: 'Greet User',
      description: 'Generate a greeting prompt',
      argsSchema: {
        name: z.string().describe('Name of the person to greet'),
        style: z.string().optional().describe('friendly (default), formal or casual')
      }
    },
    ({ name, style }) => ({
      messages: [
        {
          role: 'user',
          content: { type: 'text', text: greetingPrompt(name, style) }
        }
      ]
    })
  );
}
