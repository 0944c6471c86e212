import {
  BadRequestException,
  HttpStatus,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import {
  ApiErrorDto,
  GenerateNudgeRequestDto,
  HistoryEntry,
  Nudge,
  NudgeContext,
  PersonaConfig,
  RecordOutcomeRequestDto,
} from '@nudgeline/shared';
import { CatalogService } from '../catalog/catalog.service';
import { TemplateCatalog } from '../catalog/catalog.types';
import { normalizePersona } from '../catalog/persona.normalizer';
import { ContextScorerService } from '../context-scorer/context-scorer.service';
import { TemplateSelectorService } from '../template-selector/template-selector.service';
import { ActionPersonalizerService } from '../action-personalizer/action-personalizer.service';
import { TimingOptimizerService } from '../timing-optimizer/timing-optimizer.service';
import { ResponseFormatterService } from '../response-formatter/response-formatter.service';
import { InteractionHistoryStore } from '../history/interaction-history.store';
import { TraceService } from '../trace/trace.service';

/**
 * NudgeService
 *
 * Pipeline (strictly one-way):
 *   context → ContextScorer → TemplateSelector → ActionPersonalizer
 *           → TimingOptimizer → ResponseFormatter → Nudge | null
 *
 * generateNudge() is the pure entry point. deliver() is the HTTP-facing
 * wrapper that resolves the persona and reads/updates the per-user
 * interaction history under that user's lock.
 *
 * Nothing here catches ConfigurationError: a broken catalog must reach
 * the caller.
 */
@Injectable()
export class NudgeService {
  private readonly logger = new Logger(NudgeService.name);

  constructor(
    private readonly catalogService: CatalogService,
    private readonly contextScorer: ContextScorerService,
    private readonly templateSelector: TemplateSelectorService,
    private readonly actionPersonalizer: ActionPersonalizerService,
    private readonly timingOptimizer: TimingOptimizerService,
    private readonly responseFormatter: ResponseFormatterService,
    private readonly historyStore: InteractionHistoryStore,
    private readonly traceService: TraceService,
  ) {}

  /**
   * Run the full pipeline once.
   *
   * @param history - recent deliveries for frequency capping; null or
   *   undefined means "no history"
   * @returns null when timing says skip
   */
  generateNudge(
    persona: PersonaConfig,
    context: NudgeContext,
    catalog: TemplateCatalog,
    history?: readonly HistoryEntry[] | null,
    now: Date = new Date(),
  ): Nudge | null {
    const assessment = this.contextScorer.assess(context);
    const template = this.templateSelector.select(catalog, context, persona);
    const actions = this.actionPersonalizer.personalize(template.actions, persona);
    const timing = this.timingOptimizer.optimize(context, assessment.score, history ?? [], now, persona);
    const nudge = this.responseFormatter.format(template, actions, timing, persona, now);

    this.logger.debug(
      `[${this.traceService.getTraceId() ?? '-'}] persona=${persona.id} template=${template.id} ` +
      `score=${assessment.score} decision=${timing.decision} (${timing.reason})`,
    );

    return nudge;
  }

  /**
   * Serve one POST /nudges request.
   *
   * - explicit history: stateless, the store is neither read nor written
   * - user_id without history: store history is used, and a produced
   *   nudge is appended, all under the user's lock
   * - neither: evaluated with empty history
   */
  async deliver(request: GenerateNudgeRequestDto): Promise<Nudge | null> {
    const persona = this.resolvePersona(request);
    const context = request.context ?? {};
    const catalog = this.catalogService.getCatalog();
    const now = this.resolveNow(request.now);

    if (request.history) {
      return this.generateNudge(persona, context, catalog, request.history, now);
    }

    const userId = request.user_id;
    if (!userId) {
      return this.generateNudge(persona, context, catalog, [], now);
    }

    return this.historyStore.withUserLock(userId, () => {
      const history = this.historyStore.get(userId);
      const nudge = this.generateNudge(persona, context, catalog, history, now);

      if (nudge) {
        this.historyStore.append(userId, {
          timestamp: nudge.generated_at,
          template_id: nudge.template_id,
        });
      }
      return nudge;
    });
  }

  /**
   * Mark the user's newest delivered nudge (or the newest for template_id)
   * as accepted or dismissed.
   */
  async recordOutcome(request: RecordOutcomeRequestDto): Promise<HistoryEntry> {
    const updated = await this.historyStore.withUserLock(request.user_id, () =>
      this.historyStore.recordOutcome(request.user_id, request.outcome, request.template_id),
    );

    if (!updated) {
      const errorResponse: ApiErrorDto = {
        statusCode: HttpStatus.NOT_FOUND,
        message: request.template_id
          ? `No delivered nudge "${request.template_id}" for user "${request.user_id}"`
          : `No delivered nudge for user "${request.user_id}"`,
        error: 'Not Found',
      };
      throw new NotFoundException(errorResponse);
    }

    this.logger.log(`Recorded ${request.outcome} for ${updated.template_id} (user ${request.user_id})`);
    return updated;
  }

  private resolveNow(raw: string | undefined): Date {
    if (!raw) {
      return new Date();
    }
    const now = new Date(raw);
    if (Number.isNaN(now.getTime())) {
      const errorResponse: ApiErrorDto = {
        statusCode: HttpStatus.BAD_REQUEST,
        message: 'Validation failed',
        error: 'Bad Request',
        constraints: ['now must be an ISO 8601 calendar date or date-time'],
      };
      throw new BadRequestException(errorResponse);
    }
    return now;
  }

  /**
   * Inline persona wins over persona_id.
   */
  resolvePersona(request: GenerateNudgeRequestDto): PersonaConfig {
    if (request.persona) {
      return normalizePersona(request.persona);
    }

    if (request.persona_id) {
      const persona = this.catalogService.getPersona(request.persona_id);
      if (!persona) {
        const errorResponse: ApiErrorDto = {
          statusCode: HttpStatus.NOT_FOUND,
          message: `Unknown persona_id "${request.persona_id}"`,
          error: 'Not Found',
        };
        throw new NotFoundException(errorResponse);
      }
      return persona;
    }

    const errorResponse: ApiErrorDto = {
      statusCode: HttpStatus.BAD_REQUEST,
      message: 'Validation failed',
      error: 'Bad Request',
      constraints: ['Either persona or persona_id is required'],
    };
    throw new BadRequestException(errorResponse);
  }
}
