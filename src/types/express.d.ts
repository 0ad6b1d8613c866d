import { Principal } from '../modules/auth/domain/principal';
import { Culture } from '../shared/i18n/cultures';

declare global {
  namespace Express {
    interface Request {
      requestId?: string;
      culture?: Culture;
      principal?: Principal;
    }
  }
}

declare module 'express-session' {
  interface SessionData {
    user?: Principal;
  }
}

export {};
