import { Body, Controller, HttpCode, Post, UseGuards } from '@nestjs/common';
import { ApiBearerAuth, ApiOperation, ApiPropertyOptional, ApiTags } from '@nestjs/swagger';
import { IsIn, IsOptional, IsString, MaxLength, MinLength } from 'class-validator';
import { AuthGuard } from '../../common/guards/auth.guard';
import { CurrentUser } from '../../common/decorators/user.decorator';
import { User } from '../../database/entities/user.entity';
import { PACK_SIZES, PackSize, PurchasesService } from './purchases.service';
import { presentMe, presentUser } from '../users/user.presenter';

class PurchasePackDto {
  @ApiPropertyOptional({ enum: PACK_SIZES, default: 3 })
  @IsOptional()
  @IsIn(PACK_SIZES)
  packSize?: PackSize;

  @ApiPropertyOptional({ example: 'b1f4c0e2-7f41-4a57-9c52-2f0f5d1c9a10' })
  @IsOptional()
  @IsString()
  @MinLength(1)
  @MaxLength(64)
  requestId?: string;
}

@ApiTags('Purchases')
@ApiBearerAuth()
@UseGuards(AuthGuard)
@Controller('purchase')
export class PurchasesController {
  constructor(private readonly purchasesService: PurchasesService) {}

  @Post('full')
  @HttpCode(200)
  @ApiOperation({ summary: 'Unlock the full profile' })
  async purchaseFull(@CurrentUser() user: User) {
    return presentUser(await this.purchasesService.purchaseFull(user.id));
  }

  @Post('compat_pack')
  @HttpCode(200)
  @ApiOperation({ summary: 'Buy a pack of compatibility credits' })
  async purchasePack(@CurrentUser() user: User, @Body() dto: PurchasePackDto) {
    const updated = await this.purchasesService.purchasePack(user.id, dto.packSize ?? 3, dto.requestId);
    return presentMe(updated);
  }
}
