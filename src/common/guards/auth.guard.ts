import { CanActivate, ExecutionContext, Injectable, UnauthorizedException } from '@nestjs/common';
import type { Request } from 'express';
import { UsersService } from '../../modules/users/users.service';
import { User } from '../../database/entities/user.entity';
import { extractAuthToken } from '../utils/auth-token.util';

export interface AuthenticatedRequest extends Request {
  user?: User;
}

@Injectable()
export class AuthGuard implements CanActivate {
  constructor(private readonly usersService: UsersService) {}

  async canActivate(context: ExecutionContext): Promise<boolean> {
    const request = context.switchToHttp().getRequest<AuthenticatedRequest>();
    const token = extractAuthToken(request.headers);

    if (!token) {
      throw new UnauthorizedException('Missing auth token');
    }

    const user = await this.usersService.findByToken(token);

    if (!user) {
      throw new UnauthorizedException('Invalid auth token');
    }

    request.user = user;
    return true;
  }
}
