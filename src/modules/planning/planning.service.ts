import type {
  CreatePlanningSessionRequest,
  PlanningSessionView,
  SubmitFeedbackRequest,
  SubmitFeedbackResponse,
} from '../../core/@types';
import { plannerContainer } from '../../container';
import type { PlanningOrchestrator } from '../../core/orchestrator';

export class PlanningService {
  public constructor(private readonly orchestrator: PlanningOrchestrator) {}

  public createSession(payload: CreatePlanningSessionRequest): Promise<PlanningSessionView> {
    return this.orchestrator.createSession(payload);
  }

  public getSession(sessionId: string): PlanningSessionView {
    return this.orchestrator.getSession(sessionId);
  }

  public submitFeedback(sessionId: string, payload: SubmitFeedbackRequest): Promise<SubmitFeedbackResponse> {
    return this.orchestrator.submitFeedback(sessionId, payload.text);
  }

  public accept(sessionId: string): PlanningSessionView {
    return this.orchestrator.accept(sessionId);
  }

  public abandon(sessionId: string): void {
    this.orchestrator.abandon(sessionId);
  }
}

export const planningService = new PlanningService(plannerContainer.orchestrator);
