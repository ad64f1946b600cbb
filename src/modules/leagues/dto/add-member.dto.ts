import { IsOptional, IsUUID } from 'class-validator';

export class AddMemberDto {
  /** Defaults to the caller. */
  @IsOptional()
  @IsUUID('4')
  userId?: string;
}
