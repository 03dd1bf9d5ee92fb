/**
 * People Request Builders
 *
 * Pure mappings from validated people-tool input to request descriptors.
 */

import { buildRequest } from '../../client/request-builder.js';
import type { JsonObject, RequestDescriptor } from '../../types/request.js';
import type {
  EnrichPersonInput,
  GetSocialPostsInput,
  PersonSearchFilter,
  SearchPeopleInput,
} from '../shared/people-tools.js';

export const ENRICH_PERSON_PATH = '/screener/person/enrich';
export const SOCIAL_POSTS_PATH = '/screener/social_posts';
export const PERSON_SEARCH_PATH = '/screener/person/search';

/**
 * GET /screener/person/enrich?linkedin_profile_url=<comma-joined urls>
 */
export function buildEnrichPersonRequest(input: EnrichPersonInput): RequestDescriptor {
  return buildRequest({
    method: 'GET',
    path: ENRICH_PERSON_PATH,
    params: { linkedin_profile_url: input.linkedin_urls.join(',') },
  });
}

/**
 * GET /screener/social_posts?person_linkedin_url=...&page=N
 */
export function buildGetSocialPostsRequest(input: GetSocialPostsInput): RequestDescriptor {
  return buildRequest({
    method: 'GET',
    path: SOCIAL_POSTS_PATH,
    params: {
      person_linkedin_url: input.person_linkedin_url,
      page: input.page,
    },
  });
}

/**
 * Wire form of a filter: every key in caller order, null-valued keys dropped
 */
export function toWireFilter(filter: PersonSearchFilter): JsonObject {
  const wire: JsonObject = {};
  for (const [key, value] of Object.entries(filter)) {
    if (value === null) continue;
    wire[key] = value;
  }
  return wire;
}

/**
 * POST /screener/person/search with { filters, page }
 */
export function buildSearchPeopleRequest(input: SearchPeopleInput): RequestDescriptor {
  return buildRequest({
    method: 'POST',
    path: PERSON_SEARCH_PATH,
    jsonBody: {
      filters: input.filters.map(toWireFilter),
      page: input.page,
    },
  });
}
