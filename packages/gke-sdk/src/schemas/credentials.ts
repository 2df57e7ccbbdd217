import { z } from 'zod';

/**
 * Service-account key file as downloaded from the cloud console.
 * Only the fields the client needs are kept.
 */
export const serviceAccountKeySchema = z.object({
  type: z.string().optional(),
  project_id: z.string().optional(),
  client_email: z.string().min(1),
  private_key: z.string().min(1),
});

export type ServiceAccountKey = z.infer<typeof serviceAccountKeySchema>;
