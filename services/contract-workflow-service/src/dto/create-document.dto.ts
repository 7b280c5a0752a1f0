import { ArrayMinSize, IsArray, IsEmail, IsObject, IsOptional, IsString, MaxLength, ValidateNested } from 'class-validator';
import { Type } from 'class-transformer';

export class SignerDto {
  @IsString()
  @MaxLength(200)
  name!: string;

  @IsEmail()
  email!: string;

  @IsOptional()
  @IsString()
  @MaxLength(100)
  clientUserId?: string;
}

export class CreateDocumentDto {
  @IsString()
  role!: string;

  @IsOptional()
  @IsString()
  templateId?: string;

  @IsObject()
  inputs!: Record<string, string>;

  @IsArray()
  @ArrayMinSize(1)
  @ValidateNested({ each: true })
  @Type(() => SignerDto)
  signers!: SignerDto[];

  @IsOptional()
  @IsObject()
  metadata?: Record<string, string>;
}
