import { z } from 'zod';
import { log } from '../log';
import { defineTool, ToolRegistry, type RegisteredTool } from './toolExecutor';

export type ServiceStatus = Record<string, string>;

const DEFAULT_SERVICE_STATUS: ServiceStatus = {
  server_1: 'online',
  database: 'online',
  uptime: '99%',
};

export function serviceStatusTool(status: ServiceStatus = DEFAULT_SERVICE_STATUS): RegisteredTool {
  return defineTool({
    declaration: {
      name: 'get_service_status',
      description:
        'Get the current status of all monitored services including servers and database. ' +
        'Use this when the user asks about service health, server status, or system uptime.',
      parameters: { type: 'object', properties: {}, required: [] },
    },
    args: z.object({}),
    run: () => {
      log.info({ event: 'tool_called', tool: 'get_service_status' }, 'service status requested');
      return JSON.stringify(status);
    },
  });
}

export function reminderTool(onReminder?: (text: string) => void): RegisteredTool {
  return defineTool({
    declaration: {
      name: 'set_reminder',
      description:
        'Set a reminder with the given text. Use this when the user wants to be reminded about something.',
      parameters: {
        type: 'object',
        properties: {
          text: {
            type: 'string',
            description: 'The reminder text describing what the user wants to be reminded about.',
          },
        },
        required: ['text'],
      },
    },
    args: z.object({ text: z.string().trim().min(1) }),
    run: ({ text }) => {
      log.info({ event: 'reminder_set', text }, 'reminder set');
      onReminder?.(text);
      return 'Success';
    },
  });
}

export function createDefaultToolRegistry(
  options: { status?: ServiceStatus; onReminder?: (text: string) => void } = {},
): ToolRegistry {
  return new ToolRegistry([serviceStatusTool(options.status), reminderTool(options.onReminder)]);
}
