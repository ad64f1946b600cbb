import { IsUUID } from 'class-validator';

export class AssignRoleDto {
  @IsUUID('4')
  userId!: string;
}
