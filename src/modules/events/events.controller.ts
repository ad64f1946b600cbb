import { Body, Controller, Get, Param, Post, UseGuards } from '@nestjs/common';
import { JwtAuthGuard } from '../auth/jwt-auth.guard';
import { CurrentUser } from '../auth/current-actor.decorator';
import { AuthenticatedActor } from '../auth/actor';
import { ParseRequiredUuidPipe } from '../../common/pipes/parse-required-uuid.pipe';
import { EventsService } from './events.service';
import { CreateStageDto } from './dto/create-stage.dto';
import { EnrollParticipantDto } from './dto/enroll-participant.dto';

@Controller('events')
export class EventsController {
  constructor(private readonly eventsService: EventsService) {}

  @Get(':id')
  get(@Param('id', new ParseRequiredUuidPipe('eventId')) id: string) {
    return this.eventsService.getEvent(id);
  }

  @Get(':id/stages')
  stages(@Param('id', new ParseRequiredUuidPipe('eventId')) id: string) {
    return this.eventsService.listStages(id);
  }

  @Post(':id/stages')
  @UseGuards(JwtAuthGuard)
  addStage(
    @CurrentUser() actor: AuthenticatedActor,
    @Param('id', new ParseRequiredUuidPipe('eventId')) id: string,
    @Body() dto: CreateStageDto,
  ) {
    return this.eventsService.addStage(id, actor, dto);
  }

  @Get(':id/participants')
  participants(@Param('id', new ParseRequiredUuidPipe('eventId')) id: string) {
    return this.eventsService.listParticipants(id);
  }

  @Post(':id/participants')
  @UseGuards(JwtAuthGuard)
  enroll(
    @CurrentUser() actor: AuthenticatedActor,
    @Param('id', new ParseRequiredUuidPipe('eventId')) id: string,
    @Body() dto: EnrollParticipantDto,
  ) {
    return this.eventsService.addParticipant(id, actor, dto.userId);
  }
}
