import { z } from 'zod';
import type {
  ClipboardPayload,
  CreateLinkResponse,
  CreatedLinkData,
  CustomParameter,
  DeepLinkData,
  DeferredLinkPayload,
  LinkInfo,
  LinksResponse,
  PaginationInfo,
  UTMTags,
  UsageInfo,
} from './types.js';

export const customParameterSchema: z.ZodType<CustomParameter> = z.object({
  key: z.string(),
  value: z.string(),
});

export const utmTagsSchema: z.ZodType<UTMTags> = z.object({
  source: z.string().nullish(),
  medium: z.string().nullish(),
  campaign: z.string().nullish(),
  term: z.string().nullish(),
  content: z.string().nullish(),
});

export const deepLinkDataSchema: z.ZodType<DeepLinkData> = z.object({
  linkId: z.string(),
  shortId: z.string(),
  title: z.string().nullish(),
  description: z.string().nullish(),
  originalUrl: z.string(),
  targetUrl: z.string(),
  appUrl: z.string(),
  platform: z.string(),
  customParameters: z.array(customParameterSchema),
  utmTags: utmTagsSchema,
  timestamp: z.number(),
});

export const deferredLinkPayloadSchema: z.ZodType<DeferredLinkPayload> = z
  .object({
    shortId: z.string().min(1),
    timestamp: z.number(),
  })
  .catchall(z.unknown());

export const clipboardPayloadSchema: z.ZodType<ClipboardPayload> = z.object({
  shortId: z.string().min(1),
  timestamp: z.number(),
});

export const createdLinkDataSchema: z.ZodType<CreatedLinkData> = z.object({
  linkId: z.string(),
  shortId: z.string(),
  shortUrl: z.string(),
  originalUrl: z.string(),
  customParameters: z.record(z.string(), z.string()),
});

export const usageInfoSchema: z.ZodType<UsageInfo> = z.object({
  withinMonthlyLimit: z.boolean(),
  withinAnnualLimit: z.boolean(),
  monthlyUsage: z.number().int(),
  monthlyLimit: z.number().int(),
  annualUsage: z.number().int(),
  annualLimit: z.number().int(),
});

export const createLinkResponseSchema: z.ZodType<CreateLinkResponse> = z.object({
  success: z.boolean(),
  link: createdLinkDataSchema,
  usage: usageInfoSchema,
});

export const linkInfoSchema: z.ZodType<LinkInfo> = z.object({
  linkId: z.string(),
  shortId: z.string(),
  shortUrl: z.string(),
  title: z.string(),
  description: z.string().nullish(),
  originalUrl: z.string(),
  isActive: z.boolean(),
  clickCount: z.number().int(),
  createdAt: z.string(),
  customParameters: z.array(customParameterSchema),
});

export const paginationInfoSchema: z.ZodType<PaginationInfo> = z.object({
  page: z.number().int(),
  limit: z.number().int(),
  total: z.number().int(),
  pages: z.number().int(),
});

export const linksResponseSchema: z.ZodType<LinksResponse> = z.object({
  links: z.array(linkInfoSchema),
  pagination: paginationInfoSchema,
  usage: usageInfoSchema,
});
