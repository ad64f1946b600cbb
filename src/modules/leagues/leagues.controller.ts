import {
  Body,
  Controller,
  Get,
  HttpCode,
  Param,
  Post,
  Query,
  UseGuards,
} from '@nestjs/common';
import { JwtAuthGuard } from '../auth/jwt-auth.guard';
import { OptionalJwtAuthGuard } from '../auth/optional-jwt-auth.guard';
import { CurrentActor, CurrentUser } from '../auth/current-actor.decorator';
import { Actor, AuthenticatedActor } from '../auth/actor';
import { ParseRequiredUuidPipe } from '../../common/pipes/parse-required-uuid.pipe';
import { LeaguesService } from './leagues.service';
import { CreateLeagueDto } from './dto/create-league.dto';
import { AddMemberDto } from './dto/add-member.dto';
import { AssignRoleDto } from './dto/assign-role.dto';
import { CreatePostDto } from './dto/create-post.dto';
import { ListPostsQueryDto } from './dto/list-posts-query.dto';
import { LeagueEventsQueryDto } from './dto/league-events-query.dto';

@Controller('leagues')
export class LeaguesController {
  constructor(private readonly leaguesService: LeaguesService) {}

  @Post()
  @UseGuards(JwtAuthGuard)
  create(
    @CurrentUser() actor: AuthenticatedActor,
    @Body() dto: CreateLeagueDto,
  ) {
    return this.leaguesService.createLeague(actor, dto);
  }

  @Get()
  list() {
    return this.leaguesService.listLeagues();
  }

  @Get(':id')
  @UseGuards(OptionalJwtAuthGuard)
  detail(
    @CurrentActor() actor: Actor,
    @Param('id', new ParseRequiredUuidPipe('leagueId')) id: string,
  ) {
    return this.leaguesService.getLeagueDetail(id, actor);
  }

  // ── members ──────────────────────────────────────────────────────

  @Get(':id/members')
  roster(@Param('id', new ParseRequiredUuidPipe('leagueId')) id: string) {
    return this.leaguesService.getRoster(id);
  }

  @Post(':id/members')
  @UseGuards(JwtAuthGuard)
  addMember(
    @CurrentUser() actor: AuthenticatedActor,
    @Param('id', new ParseRequiredUuidPipe('leagueId')) id: string,
    @Body() dto: AddMemberDto,
  ) {
    return this.leaguesService.addMember(id, actor, dto.userId);
  }

  @Post(':id/moderators')
  @HttpCode(200)
  @UseGuards(JwtAuthGuard)
  addModerator(
    @CurrentActor() actor: Actor,
    @Param('id', new ParseRequiredUuidPipe('leagueId')) id: string,
    @Body() dto: AssignRoleDto,
  ) {
    return this.leaguesService.addModerator(id, actor, dto.userId);
  }

  @Post(':id/owners')
  @HttpCode(200)
  @UseGuards(JwtAuthGuard)
  addOwner(
    @CurrentActor() actor: Actor,
    @Param('id', new ParseRequiredUuidPipe('leagueId')) id: string,
    @Body() dto: AssignRoleDto,
  ) {
    return this.leaguesService.addOwner(id, actor, dto.userId);
  }

  // ── events ───────────────────────────────────────────────────────

  @Get(':id/events')
  events(
    @Param('id', new ParseRequiredUuidPipe('leagueId')) id: string,
    @Query() query: LeagueEventsQueryDto,
  ) {
    return this.leaguesService.listEvents(id, query.status);
  }

  // ── posts ────────────────────────────────────────────────────────

  @Get(':id/posts')
  posts(
    @Param('id', new ParseRequiredUuidPipe('leagueId')) id: string,
    @Query() query: ListPostsQueryDto,
  ) {
    return this.leaguesService.listPosts(id, query.limit);
  }

  @Post(':id/posts')
  @UseGuards(JwtAuthGuard)
  addPost(
    @CurrentUser() actor: AuthenticatedActor,
    @Param('id', new ParseRequiredUuidPipe('leagueId')) id: string,
    @Body() dto: CreatePostDto,
  ) {
    return this.leaguesService.addPost(id, actor, dto);
  }
}
