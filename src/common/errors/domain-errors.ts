import {
  BadRequestException,
  ConflictException,
  NotFoundException,
  UnprocessableEntityException,
} from '@nestjs/common';

/** Derived date query on an event that has no stages. */
export class EmptyCollectionError extends UnprocessableEntityException {
  constructor(subject: string) {
    super({
      statusCode: 422,
      code: 'EMPTY_COLLECTION',
      message: `${subject} has no stages`,
    });
  }
}

export class DuplicateMembershipError extends ConflictException {
  constructor(leagueId: string, userId: string) {
    super({
      statusCode: 409,
      code: 'MEMBERSHIP_EXISTS',
      message: `User ${userId} is already a member of league ${leagueId}`,
    });
  }
}

export class DuplicateParticipantError extends ConflictException {
  constructor(eventId: string, userId: string) {
    super({
      statusCode: 409,
      code: 'PARTICIPANT_EXISTS',
      message: `User ${userId} is already enrolled in event ${eventId}`,
    });
  }
}

export class MembershipNotFoundError extends NotFoundException {
  constructor(leagueId: string, userId: string) {
    super({
      statusCode: 404,
      code: 'MEMBERSHIP_NOT_FOUND',
      message: `User ${userId} is not a member of league ${leagueId}`,
    });
  }
}

/** Win percentage asked for a participant or user with zero matches. */
export class NoMatchesError extends UnprocessableEntityException {
  constructor(subject: string) {
    super({
      statusCode: 422,
      code: 'NO_MATCHES',
      message: `${subject} has no recorded matches`,
    });
  }
}

export class InvalidResultError extends BadRequestException {
  constructor(detail: string) {
    super({
      statusCode: 400,
      code: 'MATCH_INVALID_RESULT',
      message: detail,
    });
  }
}

export class InvalidStageDatesError extends BadRequestException {
  constructor(startDate: string, endDate: string) {
    super({
      statusCode: 400,
      code: 'STAGE_INVALID_DATES',
      message: `startDate ${startDate} must not be after endDate ${endDate}`,
    });
  }
}

export class InvalidMatchParticipantsError extends BadRequestException {
  constructor(detail: string) {
    super({
      statusCode: 400,
      code: 'MATCH_INVALID_PARTICIPANTS',
      message: detail,
    });
  }
}

export class DuplicateLeagueNameError extends ConflictException {
  constructor(name: string) {
    super({
      statusCode: 409,
      code: 'LEAGUE_NAME_TAKEN',
      message: `A league named "${name}" already exists`,
    });
  }
}
