import { Type } from 'class-transformer';
import {
  IsEnum,
  IsOptional,
  IsString,
  ValidateNested,
} from 'class-validator';
import { ScoringMode } from '../../scoring/interfaces/scoring.interface';

// Presence is checked by the orchestrator so every missing input is reported together.
export class AnalysisCredentialsDto {
  @IsString()
  @IsOptional()
  textGeneration?: string;

  @IsString()
  @IsOptional()
  search?: string;

  @IsString()
  @IsOptional()
  enrichment?: string;
}

export class AnalyzeRequestDto {
  @IsString()
  @IsOptional()
  domain?: string;

  @IsEnum(ScoringMode)
  @IsOptional()
  strategy?: ScoringMode;

  @ValidateNested()
  @Type(() => AnalysisCredentialsDto)
  @IsOptional()
  credentials?: AnalysisCredentialsDto;
}
