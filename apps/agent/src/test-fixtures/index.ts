import {
  AgentRunRecord,
  DirectoryItem,
  DirectoryUser,
  IDirectoryClient,
  ToolContext,
  UserAuth
} from '../app/common/interfaces';

export * from './fake-redis';
export * from './in-memory-checkpoint.store';
export * from './jwt.fixture';
export * from './scripted-chat-model';

export function makeDirectoryUser(
  overrides?: Partial<DirectoryUser>
): DirectoryUser {
  return {
    id: 'user-admin',
    email: 'admin@example.com',
    fullName: 'Ada Admin',
    isActive: true,
    isSuperuser: true,
    ...overrides
  };
}

export function makeDirectoryItem(
  overrides?: Partial<DirectoryItem>
): DirectoryItem {
  return {
    id: 'item-1',
    title: 'Desk lamp',
    description: 'Brass, adjustable',
    ownerId: 'user-admin',
    ...overrides
  };
}

/**
 * Directory with one admin user owning one item. Every method is a jest.fn
 * so tests can override or assert on it.
 */
export function makeDirectoryClient(): jest.Mocked<IDirectoryClient> {
  const user = makeDirectoryUser();
  const item = makeDirectoryItem();
  return {
    findUserByEmail: jest.fn(
      async (email: string, _auth: UserAuth, _signal?: AbortSignal) =>
        email === user.email ? user : null
    ),
    findItemById: jest.fn(
      async (itemId: string, _auth: UserAuth, _signal?: AbortSignal) =>
        itemId === item.id ? item : null
    ),
    listUserItems: jest.fn(
      async (
        userId: string,
        _limit: number,
        _auth: UserAuth,
        _signal?: AbortSignal
      ) => (userId === user.id ? [item] : [])
    )
  };
}

export function makeToolContext(overrides?: Partial<ToolContext>): ToolContext {
  return {
    userId: 'user-1',
    abortSignal: new AbortController().signal,
    auth: { mode: 'user', jwt: 'user-jwt' },
    directory: makeDirectoryClient(),
    ...overrides
  };
}

export function makeRunRecord(
  overrides?: Partial<AgentRunRecord>
): AgentRunRecord {
  return {
    id: 'run-1',
    threadId: 'thread-1',
    userId: 'user-1',
    input: 'Who is the admin user?',
    output: 'The admin user is Ada Admin (admin@example.com).',
    status: 'success',
    latencyMs: 850,
    truncated: false,
    createdAt: '2025-06-15T12:00:00.000Z',
    ...overrides
  };
}
