import type { z } from 'zod';

/** Render zod issues as `path: message` pairs, e.g. `latitude: Expected number, received string` */
export function formatZodIssues(error: z.ZodError): string {
  return error.issues
    .map((i) => (i.path.length > 0 ? `${i.path.join('.')}: ${i.message}` : i.message))
    .join(', ');
}
