import type { HttpClient } from './client.js';
import { createLinkResponseSchema, linksResponseSchema } from './schemas.js';
import type { CreateLinkOptions, CreatedLinkData, LinksResponse } from './types.js';

export class Links {
  constructor(private client: HttpClient) {}

  /** Create a link with custom parameters */
  async create(options: CreateLinkOptions): Promise<CreatedLinkData> {
    const body: Record<string, unknown> = {
      baseUrl: options.baseUrl,
      customParameters: options.customParameters ?? {},
    };
    if (options.title !== undefined) body.title = options.title;
    if (options.description !== undefined) body.description = options.description;

    const response = await this.client.post('/api/sdk/links', createLinkResponseSchema, {
      body,
      requireApiKey: true,
    });
    return response.link;
  }

  /** List the account's links, paginated */
  async list(page: number = 1, limit: number = 20): Promise<LinksResponse> {
    return this.client.get('/api/sdk/links', linksResponseSchema, {
      params: { page: String(page), limit: String(limit) },
      requireApiKey: true,
    });
  }
}
