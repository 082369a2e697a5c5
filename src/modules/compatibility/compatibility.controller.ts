import { Body, Controller, Get, HttpCode, Post, UseGuards } from '@nestjs/common';
import { ApiBearerAuth, ApiOperation, ApiProperty, ApiPropertyOptional, ApiTags } from '@nestjs/swagger';
import { IsEmail, IsIn, IsInt, IsNotEmpty, IsOptional, IsString, MaxLength, Min } from 'class-validator';
import { AuthGuard } from '../../common/guards/auth.guard';
import { CurrentUser } from '../../common/decorators/user.decorator';
import { User } from '../../database/entities/user.entity';
import { LANGUAGES, Language } from '../archetypes/archetype.constants';
import { CompatibilityService } from './compatibility.service';
import { InvitesService } from './invites.service';

class CheckCompatibilityDto {
  @ApiProperty({ example: 42 })
  @IsInt()
  @Min(1)
  target_user_id!: number;

  @ApiPropertyOptional({ enum: LANGUAGES })
  @IsOptional()
  @IsIn(LANGUAGES)
  lang?: Language;

  @ApiPropertyOptional({ description: 'Idempotency key chosen by the client' })
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  @MaxLength(64)
  requestId?: string;
}

class InviteDto {
  @ApiPropertyOptional({ example: 'friend@example.com' })
  @IsOptional()
  @IsEmail()
  email?: string;

  @ApiPropertyOptional({ example: 'friend_tg' })
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  telegram?: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  @MaxLength(64)
  requestId?: string;
}

class AcceptInviteDto {
  @ApiProperty()
  @IsString()
  @IsNotEmpty()
  token!: string;
}

@ApiTags('Compatibility')
@ApiBearerAuth()
@UseGuards(AuthGuard)
@Controller('compatibility')
export class CompatibilityController {
  constructor(
    private readonly compatibilityService: CompatibilityService,
    private readonly invitesService: InvitesService,
  ) {}

  @Post('check')
  @HttpCode(200)
  @ApiOperation({ summary: 'Compatibility report with another user (1 credit unless cached)' })
  async check(@CurrentUser() user: User, @Body() dto: CheckCompatibilityDto) {
    return this.compatibilityService.check(user, {
      targetUserId: dto.target_user_id,
      lang: dto.lang,
      requestId: dto.requestId,
    });
  }

  @Post('invite')
  @HttpCode(200)
  @ApiOperation({ summary: 'Invite someone without an account (1 credit)' })
  async invite(@CurrentUser() user: User, @Body() dto: InviteDto) {
    return this.invitesService.invite(user, { email: dto.email, telegram: dto.telegram }, dto.requestId);
  }

  @Post('accept_invite')
  @HttpCode(200)
  @ApiOperation({ summary: 'Accept an invite and get the report' })
  async acceptInvite(@CurrentUser() user: User, @Body() dto: AcceptInviteDto) {
    return this.invitesService.acceptInvite(user, dto.token);
  }

  @Get('list')
  @ApiOperation({ summary: 'Ready reports of the current user' })
  async list(@CurrentUser() user: User) {
    const items = await this.compatibilityService.list(user);
    return { items, history: items };
  }
}
