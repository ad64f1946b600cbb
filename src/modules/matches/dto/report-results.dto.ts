import { IsInt, IsOptional, Max, Min } from 'class-validator';

export class ReportResultsDto {
  @IsInt()
  @Min(0)
  @Max(99)
  p1Wins!: number;

  @IsInt()
  @Min(0)
  @Max(99)
  p2Wins!: number;

  @IsOptional()
  @IsInt()
  @Min(0)
  @Max(99)
  draws?: number;
}
