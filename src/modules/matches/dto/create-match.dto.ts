import { IsUUID } from 'class-validator';

export class CreateMatchDto {
  @IsUUID('4')
  participant1Id!: string;

  @IsUUID('4')
  participant2Id!: string;
}
