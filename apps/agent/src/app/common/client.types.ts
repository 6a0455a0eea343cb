import { UserAuth } from './auth.types';

export interface DirectoryUser {
  id: string;
  email: string;
  fullName: string | null;
  isActive: boolean;
  isSuperuser: boolean;
}

export interface DirectoryItem {
  id: string;
  title: string;
  description: string | null;
  ownerId: string;
}

/**
 * Read-only access to the external user/item directory. `null` means the
 * directory answered 404; every other failure is thrown as a
 * `DirectoryClientError`. `signal` aborts the underlying request.
 */
export interface IDirectoryClient {
  findUserByEmail(
    email: string,
    auth: UserAuth,
    signal?: AbortSignal
  ): Promise<DirectoryUser | null>;
  findItemById(
    itemId: string,
    auth: UserAuth,
    signal?: AbortSignal
  ): Promise<DirectoryItem | null>;
  listUserItems(
    userId: string,
    limit: number,
    auth: UserAuth,
    signal?: AbortSignal
  ): Promise<DirectoryItem[]>;
}
