import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { z } from 'zod';

import {
  DirectoryItem,
  DirectoryUser,
  IDirectoryClient,
  UserAuth
} from '../common/interfaces';

export class DirectoryClientError extends Error {
  constructor(
    public readonly statusCode: number,
    message: string,
    public readonly path: string
  ) {
    super(message);
    this.name = 'DirectoryClientError';
  }
}

const REQUEST_TIMEOUT_MS = 10000;

const userSchema = z
  .object({
    id: z.string(),
    email: z.string(),
    full_name: z.string().nullable().default(null),
    is_active: z.boolean(),
    is_superuser: z.boolean()
  })
  .transform(
    (u): DirectoryUser => ({
      id: u.id,
      email: u.email,
      fullName: u.full_name,
      isActive: u.is_active,
      isSuperuser: u.is_superuser
    })
  );

const itemSchema = z
  .object({
    id: z.string(),
    title: z.string(),
    description: z.string().nullable().default(null),
    owner_id: z.string()
  })
  .transform(
    (i): DirectoryItem => ({
      id: i.id,
      title: i.title,
      description: i.description,
      ownerId: i.owner_id
    })
  );

const itemListSchema = z.object({ data: z.array(itemSchema) });

@Injectable()
export class DirectoryClientService implements IDirectoryClient {
  private readonly baseUrl: string;

  constructor(config: ConfigService) {
    this.baseUrl = config
      .get<string>('DIRECTORY_BASE_URL', 'http://localhost:8080')
      .replace(/\/+$/, '');
  }

  async findUserByEmail(
    email: string,
    auth: UserAuth,
    signal?: AbortSignal
  ): Promise<DirectoryUser | null> {
    const query = new URLSearchParams({ email });
    return this.request(`/api/v1/users/lookup?${query}`, auth, userSchema, {
      allowNotFound: true,
      signal
    });
  }

  async findItemById(
    itemId: string,
    auth: UserAuth,
    signal?: AbortSignal
  ): Promise<DirectoryItem | null> {
    return this.request(
      `/api/v1/items/${encodeURIComponent(itemId)}`,
      auth,
      itemSchema,
      { allowNotFound: true, signal }
    );
  }

  async listUserItems(
    userId: string,
    limit: number,
    auth: UserAuth,
    signal?: AbortSignal
  ): Promise<DirectoryItem[]> {
    const query = new URLSearchParams({ owner_id: userId, limit: String(limit) });
    const page = await this.request(
      `/api/v1/items?${query}`,
      auth,
      itemListSchema,
      { signal }
    );
    return page?.data ?? [];
  }

  private async request<T>(
    path: string,
    auth: UserAuth,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    opts: { allowNotFound?: boolean; signal?: AbortSignal } = {}
  ): Promise<T | null> {
    const timeout = AbortSignal.timeout(REQUEST_TIMEOUT_MS);
    const response = await fetch(`${this.baseUrl}${path}`, {
      method: 'GET',
      headers: {
        'Content-Type': 'application/json',
        Authorization: `Bearer ${auth.jwt}`
      },
      signal: opts.signal ? AbortSignal.any([opts.signal, timeout]) : timeout
    });

    if (response.status === 404 && opts.allowNotFound) return null;
    if (!response.ok) {
      throw new DirectoryClientError(
        response.status,
        await response.text(),
        path
      );
    }

    const parsed = schema.safeParse(await response.json());
    if (!parsed.success) {
      throw new DirectoryClientError(
        response.status,
        `Unexpected directory response: ${parsed.error.issues[0]?.message ?? 'invalid body'}`,
        path
      );
    }
    return parsed.data;
  }
}
