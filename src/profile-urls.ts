import { z } from 'zod';
import { cleanProfileUrl } from './scraper/profiles.js';

// Shape of a saved /linkedin-profiles response; only what the export needs.
const savedProfilesSchema = z.object({
  data: z.array(z.object({
    company_name: z.string().optional(),
    profiles: z.array(z.object({ profile_url: z.string().nullish() }).passthrough()),
  }).passthrough()),
}).passthrough();

export interface BulkUrlInput {
  url: string;
}

/**
 * Profile URLs from a saved profiles response, without query strings,
 * duplicates removed, in the `[{ url }]` form bulk profile APIs take.
 */
export function collectProfileUrls(doc: unknown): BulkUrlInput[] {
  const parsed = savedProfilesSchema.safeParse(doc);
  if (!parsed.success) {
    throw new Error('Not a profiles response: expected { data: [{ profiles: [...] }] }');
  }

  const seen = new Set<string>();
  const urls: BulkUrlInput[] = [];
  for (const company of parsed.data.data) {
    for (const profile of company.profiles) {
      if (!profile.profile_url) continue;
      let url: string;
      try {
        url = cleanProfileUrl(profile.profile_url);
      } catch {
        continue; // not a URL
      }
      if (seen.has(url)) continue;
      seen.add(url);
      urls.push({ url });
    }
  }
  return urls;
}
