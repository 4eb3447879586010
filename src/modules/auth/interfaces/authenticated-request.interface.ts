import { Request } from 'express';
import { AccountRole } from '../../../database/entities/account.entity';

export interface AuthenticatedAccount {
  id: string;
  email: string;
  role: AccountRole;
}

export interface AuthenticatedRequest extends Request {
  account?: AuthenticatedAccount;
  correlationId?: string;
}
