import { z } from 'zod';

export const MAX_ENTITIES_PER_REQUEST = 50;

const businessNames = z
  .array(z.string().trim().min(1, 'Business name must not be empty'))
  .min(1, 'At least one business name is required')
  .max(MAX_ENTITIES_PER_REQUEST, `At most ${MAX_ENTITIES_PER_REQUEST} business names per request`);

export const reviewsRequestSchema = z.object({
  business_names: businessNames,
});

export const profilesRequestSchema = z.object({
  business_names: businessNames,
  email: z.string().trim().min(1, 'email is required'),
  password: z.string().min(1, 'password is required'),
  include_details: z.boolean().optional().default(false),
});

export type ReviewsRequest = z.infer<typeof reviewsRequestSchema>;
export type ProfilesRequest = z.infer<typeof profilesRequestSchema>;
