import { Body, Controller, Get, Headers, HttpCode, Param, Post, UseGuards } from '@nestjs/common';
import { ApiBearerAuth, ApiOperation, ApiProperty, ApiPropertyOptional, ApiTags } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import {
  ArrayMaxSize, IsIn, IsInt, IsNotEmpty, IsOptional, IsString, IsUUID, MaxLength, ValidateNested,
} from 'class-validator';
import { AuthGuard } from '../../common/guards/auth.guard';
import { CurrentUser } from '../../common/decorators/user.decorator';
import { AuthHeaders, extractAuthToken } from '../../common/utils/auth-token.util';
import { User } from '../../database/entities/user.entity';
import { GENDER_FORMS, LANGUAGES, Language } from '../archetypes/archetype.constants';
import { AnalysisService } from './analysis.service';

class AnswerDto {
  @ApiProperty({ example: 1 })
  @IsInt()
  questionId!: number;

  @ApiProperty({ example: 'B' })
  @IsString()
  @MaxLength(50)
  answer!: string;
}

class AnalyzeShortDto {
  @ApiProperty({ example: 'Anna' })
  @IsString()
  @IsNotEmpty()
  @MaxLength(80)
  name!: string;

  @ApiProperty({ enum: LANGUAGES, example: 'ru' })
  @IsIn(LANGUAGES)
  lang!: Language;

  @ApiPropertyOptional({ enum: GENDER_FORMS, default: 'unspecified' })
  @IsOptional()
  @IsIn(GENDER_FORMS)
  gender?: string;

  @ApiProperty({ type: [AnswerDto] })
  @ValidateNested({ each: true })
  @ArrayMaxSize(200)
  @Type(() => AnswerDto)
  answers!: AnswerDto[];

  @ApiPropertyOptional({ example: 'Wolf' })
  @IsOptional()
  @IsString()
  lockedAnimal?: string;

  @ApiPropertyOptional({ example: 'Fire' })
  @IsOptional()
  @IsString()
  lockedElement?: string;

  @ApiPropertyOptional({ example: 'male' })
  @IsOptional()
  @IsString()
  lockedGenderForm?: string;

  @ApiPropertyOptional({ description: 'Client-chosen run id (UUID)' })
  @IsOptional()
  @IsUUID()
  runId?: string;
}

class AnalyzeFullDto {
  @ApiProperty({ description: 'Run id returned by /analyze/short' })
  @IsString()
  result_id!: string;
}

@ApiTags('Analysis')
@Controller()
export class AnalysisController {
  constructor(private readonly analysisService: AnalysisService) {}

  @Post('analyze/short')
  @HttpCode(200)
  @ApiOperation({ summary: 'Resolve the archetype and generate the short profile' })
  async analyzeShort(@Body() dto: AnalyzeShortDto, @Headers() headers: AuthHeaders) {
    return this.analysisService.analyzeShort(
      {
        name: dto.name,
        lang: dto.lang,
        gender: dto.gender ?? 'unspecified',
        answers: dto.answers,
        locked: { animal: dto.lockedAnimal, element: dto.lockedElement, genderForm: dto.lockedGenderForm },
        runId: dto.runId,
      },
      extractAuthToken(headers),
    );
  }

  @Get('result/short/:runId')
  @ApiOperation({ summary: 'Stored short profile of a run' })
  async getShort(@Param('runId') runId: string) {
    return this.analysisService.getShort(runId);
  }

  @Post('analyze/full')
  @HttpCode(200)
  @UseGuards(AuthGuard)
  @ApiBearerAuth()
  @ApiOperation({ summary: 'Generate (or reuse) the full profile of a run' })
  async analyzeFull(@CurrentUser() user: User, @Body() dto: AnalyzeFullDto) {
    return this.analysisService.analyzeFull(user, dto.result_id);
  }

  @Get('result/full/:runId')
  @UseGuards(AuthGuard)
  @ApiBearerAuth()
  @ApiOperation({ summary: 'Stored full profile of a run' })
  async getFull(@CurrentUser() user: User, @Param('runId') runId: string) {
    return this.analysisService.getFull(user, runId);
  }
}
