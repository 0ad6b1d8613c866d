export interface Principal {
  username: string;
  role: string;
}

export interface IssuedToken {
  tokenType: 'Bearer';
  accessToken: string;
  expiresIn: number;
}
