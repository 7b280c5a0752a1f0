import { IsOptional, IsString, MaxLength } from 'class-validator';

export class CancelDocumentDto {
  @IsOptional()
  @IsString()
  @MaxLength(500)
  reason?: string;
}
