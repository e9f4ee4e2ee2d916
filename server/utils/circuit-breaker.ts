import { logger } from "./logger";
import { CIRCUIT_FAILURE_THRESHOLD, CIRCUIT_RESET_TIMEOUT_MS } from "../config/keyphrase-extraction";

// Circuit breaker pattern for API failures
export class CircuitBreaker {
    private failures: number = 0;
    private lastFailureTime: number = 0;
    private state: 'closed' | 'open' | 'half-open' = 'closed';

    constructor(
        private readonly failureThreshold: number = CIRCUIT_FAILURE_THRESHOLD,
        private readonly resetTimeout: number = CIRCUIT_RESET_TIMEOUT_MS,
        private readonly now: () => number = Date.now,
    ) {}

    get currentState(): 'closed' | 'open' | 'half-open' {
        return this.state;
    }

    canAttempt(): boolean {
        if (this.state === 'open') {
            if (this.now() - this.lastFailureTime > this.resetTimeout) {
                this.state = 'half-open';
                logger.info("Circuit breaker transitioning to half-open", {});
                return true;
            }
            return false;
        }
        return true;
    }

    recordSuccess(): void {
        this.failures = 0;
        this.state = 'closed';
    }

    recordFailure(): void {
        this.failures++;
        this.lastFailureTime = this.now();
        if (this.failures >= this.failureThreshold) {
            this.state = 'open';
            logger.warn("Circuit breaker opened due to too many failures", { failures: this.failures });
        }
    }
}
