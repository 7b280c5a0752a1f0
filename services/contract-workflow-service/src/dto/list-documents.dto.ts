import { IsIn, IsInt, IsOptional, IsString, Max, Min } from 'class-validator';
import { Type } from 'class-transformer';
import { DOCUMENT_ROLES, DOCUMENT_STATES, DocumentRole, DocumentState } from '../domain/document';

export class ListDocumentsDto {
  @IsOptional()
  @IsIn(DOCUMENT_STATES)
  state?: DocumentState;

  @IsOptional()
  @IsIn(DOCUMENT_ROLES)
  role?: DocumentRole;

  @IsOptional()
  @IsString()
  envelopeId?: string;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(200)
  limit?: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(0)
  offset?: number;
}
