/**
 * People Tool Definitions
 *
 * Person enrichment, social posts and people search.
 */

import { z } from 'zod';
import { defineTool } from './types.js';
import { JsonValueSchema } from './json-value.js';
import type { JsonValue } from '../../types/request.js';
import {
  buildEnrichPersonRequest,
  buildGetSocialPostsRequest,
  buildSearchPeopleRequest,
} from '../people/requests.js';

/** Maximum profiles per enrichment request */
export const MAX_LINKEDIN_URLS = 25;

export const FILTER_OPERATIONS = ['in', 'not in'] as const;

export const EnrichPersonInputSchema = z.object({
  linkedin_urls: z
    .array(z.string().trim())
    .min(1)
    .max(MAX_LINKEDIN_URLS)
    .describe(
      "LinkedIn profile URLs to enrich, e.g. 'https://www.linkedin.com/in/example-person/' (1-25)"
    ),
});

export const GetSocialPostsInputSchema = z.object({
  person_linkedin_url: z
    .string()
    .trim()
    .describe('LinkedIn profile URL of the person'),
  page: z
    .number()
    .int()
    .min(1)
    .default(1)
    .describe('Page number, 20 posts per page (default: 1)'),
});

/**
 * One people search filter. Keys beyond the documented three are kept
 * and sent as-is.
 */
export const PersonSearchFilterSchema = z
  .object({
    filter_type: z
      .string()
      .describe("Filter type, e.g. 'CURRENT_COMPANY', 'CURRENT_TITLE', 'SENIORITY_LEVEL', 'INDUSTRY'"),
    type: z.enum(FILTER_OPERATIONS).describe("Operation: 'in' or 'not in'"),
    value: JsonValueSchema.describe('Filter value(s), usually a list'),
  })
  .catchall(JsonValueSchema);

export const SearchPeopleInputSchema = z.object({
  filters: z
    .array(PersonSearchFilterSchema)
    .min(1)
    .describe('Search filters, combined with AND'),
  page: z
    .number()
    .int()
    .min(1)
    .default(1)
    .describe('Page number, 25 results per page (default: 1)'),
});

export type EnrichPersonInput = z.output<typeof EnrichPersonInputSchema>;
export type GetSocialPostsInput = z.output<typeof GetSocialPostsInputSchema>;

/**
 * A filter with its documented keys typed and any extra keys as JSON values.
 * zod's inferred type drops the catchall index for a ZodType<JsonValue> catchall.
 */
export type PersonSearchFilter = z.output<typeof PersonSearchFilterSchema> & {
  [key: string]: JsonValue;
};

export type SearchPeopleInput = Omit<z.output<typeof SearchPeopleInputSchema>, 'filters'> & {
  filters: PersonSearchFilter[];
};

/**
 * crustdata_enrich_person tool
 */
export const enrichPersonTool = defineTool({
  name: 'crustdata_enrich_person',
  title: 'Enrich Person',
  description:
    'Enrich LinkedIn profiles with professional data: employment history, education, skills and connections. ' +
    'Profiles not yet indexed are enriched by Crustdata within 30-60 minutes; query again after that. ' +
    'Runs in dry-run mode and returns the request that would be sent.',
  schema: EnrichPersonInputSchema,
  buildRequest: buildEnrichPersonRequest,
});

/**
 * crustdata_get_social_posts tool
 */
export const getSocialPostsTool = defineTool({
  name: 'crustdata_get_social_posts',
  title: 'Get Social Posts',
  description:
    'Get recent LinkedIn posts of a person with reactions, comments, shares and the people who engaged. ' +
    'The live endpoint fetches in real time (30-60 s latency). ' +
    'Runs in dry-run mode and returns the request that would be sent.',
  schema: GetSocialPostsInputSchema,
  buildRequest: buildGetSocialPostsRequest,
});

/**
 * crustdata_search_people tool
 */
export const searchPeopleTool = defineTool({
  name: 'crustdata_search_people',
  title: 'Search People',
  description: [
    'Search professional profiles with structured filters combined with AND. 25 results per page.',
    'Runs in dry-run mode and returns the request that would be sent.',
    '',
    'Filter types:',
    '  CURRENT_COMPANY, PAST_COMPANY: company names',
    '  CURRENT_TITLE, PAST_TITLE: job titles',
    "  SENIORITY_LEVEL: 'Owner / Partner', 'CXO', 'Vice President', 'Director', 'Experienced Manager',",
    "    'Entry Level Manager', 'Strategic', 'Senior', 'Entry Level', 'In Training'",
    '  INDUSTRY, REGION, FUNCTION, KEYWORD: free text',
    "  COMPANY_HEADCOUNT: 'Self-employed', '1-10', '11-50', '51-200', '201-500', '501-1,000',",
    "    '1,001-5,000', '5,001-10,000', '10,001+'",
    "  YEARS_AT_CURRENT_COMPANY, YEARS_OF_EXPERIENCE: 'Less than 1 year', '1 to 2 years',",
    "    '3 to 5 years', '6 to 10 years', 'More than 10 years'",
    "  COMPANY_TYPE: 'Public Company', 'Privately Held', 'Non Profit', ...",
    'Boolean filters (value ignored): POSTED_ON_SOCIAL_MEDIA, RECENTLY_CHANGED_JOBS, IN_THE_NEWS',
  ].join('\n'),
  schema: SearchPeopleInputSchema,
  buildRequest: buildSearchPeopleRequest,
});

/**
 * All people-related tools
 */
export const peopleTools = [enrichPersonTool, getSocialPostsTool, searchPeopleTool] as const;
