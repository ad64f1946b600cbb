import { IsNotEmpty, IsString, MaxLength } from 'class-validator';

export class CreateLeagueDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(255)
  name!: string;
}
