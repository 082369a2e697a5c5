import { BadRequestException, Controller, Get, NotFoundException, Query, UseGuards } from '@nestjs/common';
import { ApiBearerAuth, ApiOperation, ApiQuery, ApiTags } from '@nestjs/swagger';
import { AuthGuard } from '../../common/guards/auth.guard';
import { CurrentUser } from '../../common/decorators/user.decorator';
import { User } from '../../database/entities/user.entity';
import { UsersService } from './users.service';
import { presentMe } from './user.presenter';

@ApiTags('Users')
@ApiBearerAuth()
@UseGuards(AuthGuard)
@Controller('users')
export class UsersController {
  constructor(private readonly usersService: UsersService) {}

  @Get('me')
  @ApiOperation({ summary: 'Current user balance and entitlements' })
  getMe(@CurrentUser() user: User) {
    return presentMe(user);
  }

  @Get('lookup')
  @ApiOperation({ summary: 'Find a registered user by email or telegram handle' })
  @ApiQuery({ name: 'q', example: 'friend@example.com' })
  async lookup(@Query('q') q?: string) {
    const query = q?.trim();
    if (!query) throw new BadRequestException('q is required');

    const user = await this.usersService.findByContact(query);
    if (!user) throw new NotFoundException('User not found');

    return { id: user.id, name: user.name, lang: user.lang };
  }
}
