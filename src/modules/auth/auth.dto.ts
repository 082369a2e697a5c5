import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import {
  IsEmail, IsIn, IsInt, IsNotEmpty, IsOptional, IsString, MaxLength, ValidateNested,
} from 'class-validator';
import { ANIMALS, GENDER_FORMS, LANGUAGES, Language } from '../archetypes/archetype.constants';

export class ShortResultDto {
  @ApiProperty({ enum: ANIMALS, example: 'Wolf' })
  @IsIn(ANIMALS)
  animal!: string;

  @ApiProperty({ example: 'Fire', description: 'Element code or its label in any supported language' })
  @IsString()
  @IsNotEmpty()
  element!: string;

  @ApiProperty({ enum: GENDER_FORMS, example: 'male' })
  @IsIn(GENDER_FORMS)
  genderForm!: string;

  @ApiProperty({ example: 'Anna — Wolf Fire ...' })
  @IsString()
  text!: string;
}

export class RegisterDto {
  @ApiPropertyOptional({ example: 'anna@example.com' })
  @IsOptional()
  @IsEmail()
  @MaxLength(255)
  email?: string;

  @ApiPropertyOptional({ example: 'anna_tg' })
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  @MaxLength(255)
  telegram?: string;

  @ApiPropertyOptional({ example: 'Anna' })
  @IsOptional()
  @IsString()
  @MaxLength(120)
  name?: string;

  @ApiPropertyOptional({ enum: LANGUAGES, example: 'en' })
  @IsOptional()
  @IsIn(LANGUAGES)
  lang?: Language;

  @ApiPropertyOptional({ type: ShortResultDto })
  @IsOptional()
  @ValidateNested()
  @Type(() => ShortResultDto)
  shortResult?: ShortResultDto;
}

export class GoogleAuthDto {
  @ApiProperty({ description: 'Google ID token from the client SDK' })
  @IsString()
  @IsNotEmpty()
  idToken!: string;

  @ApiPropertyOptional({ example: 'Anna' })
  @IsOptional()
  @IsString()
  @MaxLength(120)
  name?: string;

  @ApiPropertyOptional({ enum: LANGUAGES })
  @IsOptional()
  @IsIn(LANGUAGES)
  lang?: Language;
}

/** Fields signed by the Telegram Login Widget. */
export class TelegramAuthDto {
  @ApiProperty({ example: 123456789 })
  @IsInt()
  id!: number;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  first_name?: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  last_name?: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  username?: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  photo_url?: string;

  @ApiProperty({ example: 1735689600 })
  @IsInt()
  auth_date!: number;

  @ApiProperty()
  @IsString()
  @IsNotEmpty()
  hash!: string;
}

export class DevSeedUserDto {
  @ApiPropertyOptional()
  @IsOptional()
  @IsEmail()
  email?: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  telegram?: string;

  @ApiProperty()
  @IsString()
  @IsNotEmpty()
  name!: string;

  @ApiProperty({ enum: LANGUAGES })
  @IsIn(LANGUAGES)
  lang!: Language;

  @ApiProperty({ enum: ANIMALS })
  @IsIn(ANIMALS)
  animal!: string;

  @ApiProperty({ example: 'Water' })
  @IsString()
  element!: string;

  @ApiProperty({ enum: GENDER_FORMS })
  @IsIn(GENDER_FORMS)
  genderForm!: string;

  @ApiProperty()
  @IsString()
  short_text!: string;
}
