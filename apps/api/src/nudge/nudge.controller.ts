import {
  Body,
  Controller,
  HttpCode,
  HttpStatus,
  Post,
  Res,
} from '@nestjs/common';
import { FastifyReply } from 'fastify';
import { NudgeResponseDto, RecordOutcomeResponseDto } from '@nudgeline/shared';
import { NudgeService } from './nudge.service';
import { GenerateNudgeBody } from './dto/generate-nudge.dto';
import { RecordOutcomeBody } from './dto/record-outcome.dto';

/**
 * Nudge Controller
 *
 * - POST /nudges → 200 NudgeResponseDto, or 204 with no body when the
 *   timing decision is skip
 * - POST /nudges/outcome → 200 with the updated history entry, 404 when
 *   the user has no matching delivered nudge
 */
@Controller('nudges')
export class NudgeController {
  constructor(private readonly nudgeService: NudgeService) {}

  @Post()
  @HttpCode(HttpStatus.OK)
  async generate(
    @Body() body: GenerateNudgeBody,
    @Res({ passthrough: true }) reply: FastifyReply,
  ): Promise<NudgeResponseDto | undefined> {
    const nudge = await this.nudgeService.deliver(body);

    if (!nudge) {
      reply.status(HttpStatus.NO_CONTENT);
      return undefined;
    }
    return nudge;
  }

  @Post('outcome')
  @HttpCode(HttpStatus.OK)
  async recordOutcome(@Body() body: RecordOutcomeBody): Promise<RecordOutcomeResponseDto> {
    return this.nudgeService.recordOutcome(body);
  }
}
