import { z } from 'zod';
import { formatCurrentTime } from '../services/time';
import { defineTool, type Tool } from './define';

export function createTimeTools(defaultTimeZone: string, clock: () => Date = () => new Date()): Tool[] {
  return [
    defineTool({
      name: 'get_time',
      title: 'Get Current Time',
      description: `Returns the current date and time in a time zone (default ${defaultTimeZone}).`,
      annotations: { readOnlyHint: true, openWorldHint: false },
      input: {
        time_zone: z.string().min(1).optional().describe('IANA time zone, e.g. "America/Chicago"')
      },
      resultKey: 'time',
      result: z.string(),
      run: async ({ time_zone }) => formatCurrentTime(time_zone ?? defaultTimeZone, clock())
    })
  ];
}
