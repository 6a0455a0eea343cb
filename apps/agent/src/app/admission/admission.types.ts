export type AdmissionScope = 'agent_run' | 'agent_history' | 'agent_evaluation';

export type AdmissionDecision =
  | { allowed: true; limit: number; remaining: number; resetAt: number }
  | {
      allowed: false;
      limit: number;
      retryAfterSeconds: number;
      resetAt: number;
    };
