import { IsArray, IsIn, IsNumber, IsOptional, IsString } from 'class-validator';

// k is range-checked by the orchestrator so that a bad k yields INVALID_QUERY.
export class ComparisonQueryDto {
  @IsNumber()
  k!: number;

  @IsOptional()
  @IsString()
  text?: string;

  @IsOptional()
  @IsString()
  documentId?: string;

  @IsOptional()
  @IsArray()
  @IsNumber({}, { each: true })
  vector?: number[];

  @IsOptional()
  @IsIn(['document', 'plan'])
  kind?: 'document' | 'plan';
}
