import {
  Body,
  Controller,
  Get,
  HttpCode,
  Param,
  Post,
  UseGuards,
} from '@nestjs/common';
import { JwtAuthGuard } from '../auth/jwt-auth.guard';
import { CurrentUser } from '../auth/current-actor.decorator';
import { AuthenticatedActor } from '../auth/actor';
import { ParseRequiredUuidPipe } from '../../common/pipes/parse-required-uuid.pipe';
import { MatchesService } from './matches.service';
import { CreateMatchDto } from './dto/create-match.dto';
import { ReportResultsDto } from './dto/report-results.dto';

@Controller()
export class MatchesController {
  constructor(private readonly service: MatchesService) {}

  @Get('matches/:id')
  get(@Param('id', new ParseRequiredUuidPipe('matchId')) id: string) {
    return this.service.getMatch(id);
  }

  @Post('matches/:id/results')
  @HttpCode(200)
  @UseGuards(JwtAuthGuard)
  addResults(
    @CurrentUser() actor: AuthenticatedActor,
    @Param('id', new ParseRequiredUuidPipe('matchId')) id: string,
    @Body() dto: ReportResultsDto,
  ) {
    return this.service.addResults(id, actor, dto);
  }

  @Get('stages/:id/matches')
  forStage(@Param('id', new ParseRequiredUuidPipe('stageId')) id: string) {
    return this.service.listMatchesForStage(id);
  }

  @Post('stages/:id/matches')
  @UseGuards(JwtAuthGuard)
  create(
    @CurrentUser() actor: AuthenticatedActor,
    @Param('id', new ParseRequiredUuidPipe('stageId')) id: string,
    @Body() dto: CreateMatchDto,
  ) {
    return this.service.createMatch(id, actor, dto);
  }

  @Get('participants/:id/matches')
  forParticipant(
    @Param('id', new ParseRequiredUuidPipe('participantId')) id: string,
  ) {
    return this.service.listMatchesForParticipant(id);
  }
}
