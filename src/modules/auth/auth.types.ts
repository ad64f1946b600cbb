/** Shape put on `req.user` by the JWT strategy. */
export interface AuthUser {
  userId: string;
  email: string;
  admin: boolean;
}

export interface JwtPayload {
  sub: string;
  email: string;
}
