export interface UserAuth {
  mode: 'user';
  jwt: string;
}

export interface AuthUser {
  userId: string;
  rawJwt: string;
}
