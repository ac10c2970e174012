/**
 * Wizard State Machine
 *
 * Drives the unknown sequence of screens between postcode entry and the
 * offers page. Each step tries, in order: address picker, moving question,
 * extra fields, then a plain continue click. The loop ends early once a
 * result marker is on the page.
 */

import { logger } from '../utils/logger.js';
import { TIMEOUTS } from '../utils/timeouts.js';
import type { NavigationCounters, ScrapeRequest } from '../types/index.js';
import type { NavigationDriver } from './navigation-driver.js';

const log = logger.wizard;

export type WizardInput = Pick<
  ScrapeRequest,
  'addressHint' | 'addressIndex' | 'moving' | 'extraFields' | 'maxSteps'
>;

export interface WizardOutcome {
  /** A result marker was seen before the final wait */
  reachedResults: boolean;
  /** Iterations that ran */
  iterations: number;
}

export class WizardStateMachine {
  constructor(private readonly driver: NavigationDriver) {}

  async driveToResults(
    input: WizardInput,
    resultSelectors: readonly string[],
    counters: NavigationCounters
  ): Promise<WizardOutcome> {
    let iterations = 0;

    for (let step = 0; step < input.maxSteps; step++) {
      if (await this.driver.hasAnyResult(resultSelectors)) {
        log.debug('Result marker present', { step, wizardSteps: counters.wizardSteps });
        return { reachedResults: true, iterations };
      }
      iterations++;

      let progressed = false;
      if (await this.driver.resolveAddressPicker(input.addressHint, input.addressIndex)) {
        counters.wizardSteps++;
        progressed = true;
      }
      if (await this.driver.answerMovingQuestion(input.moving)) {
        counters.wizardSteps++;
        progressed = true;
      }
      if (await this.driver.fillAdditionalFields(input.extraFields)) {
        counters.wizardSteps++;
        progressed = true;
      }
      if (await this.driver.clickContinueLike()) {
        counters.wizardSteps++;
        progressed = true;
      }

      await this.driver.settle(TIMEOUTS.WIZARD_ITERATION);
      if (!progressed) {
        await this.driver.settle(TIMEOUTS.WIZARD_IDLE);
      }
    }

    const appeared = await this.driver.waitForAnyResult(resultSelectors);
    log.debug('Wizard budget spent', { iterations, wizardSteps: counters.wizardSteps, appeared });
    return { reachedResults: appeared, iterations };
  }
}
