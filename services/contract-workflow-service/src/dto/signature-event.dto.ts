import { IsString, MaxLength } from 'class-validator';

export class SignatureEventDto {
  @IsString()
  @MaxLength(100)
  envelopeId!: string;

  @IsString()
  @MaxLength(50)
  status!: string;
}
