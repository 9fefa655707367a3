import {
  IsBoolean,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  Min,
  ValidateIf,
} from 'class-validator';

export class SyncRequestDto {
  // Absent keeps the default, null is rejected
  @ValidateIf((_dto, value) => value !== undefined)
  @IsBoolean()
  force_update: boolean = true;

  // null lifts the limit, an absent field keeps the default
  @IsOptional()
  @IsInt()
  @Min(0)
  page_limit: number | null = 100;
}

export class ChatQueryDto {
  @IsString()
  @IsNotEmpty()
  question!: string;
}
