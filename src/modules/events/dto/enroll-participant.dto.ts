import { IsOptional, IsUUID } from 'class-validator';

export class EnrollParticipantDto {
  /** Defaults to the caller. */
  @IsOptional()
  @IsUUID('4')
  userId?: string;
}
