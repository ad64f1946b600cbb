import { Body, Controller, Param, Post, UseGuards } from '@nestjs/common';
import { JwtAuthGuard } from '../auth/jwt-auth.guard';
import { CurrentUser } from '../auth/current-actor.decorator';
import { AuthenticatedActor } from '../auth/actor';
import { ParseRequiredUuidPipe } from '../../common/pipes/parse-required-uuid.pipe';
import { EventsService } from './events.service';
import { CreateEventDto } from './dto/create-event.dto';

// Listing lives on LeaguesController; creation needs the events service.
@Controller('leagues')
@UseGuards(JwtAuthGuard)
export class LeagueEventsController {
  constructor(private readonly eventsService: EventsService) {}

  @Post(':leagueId/events')
  create(
    @CurrentUser() actor: AuthenticatedActor,
    @Param('leagueId', new ParseRequiredUuidPipe('leagueId')) leagueId: string,
    @Body() dto: CreateEventDto,
  ) {
    return this.eventsService.createEvent(leagueId, actor, dto);
  }
}
