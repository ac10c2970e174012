/**
 * Tests for the navigation driver
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { NavigationDriver } from '../../src/core/navigation-driver.js';
import type { NavigationCounters } from '../../src/types/index.js';
import { FakePage } from '../helpers/fake-page.js';
import { CONTINUE, COOKIE, POSTCODE_INPUT, RESULT, SUBMIT, testProfile } from '../helpers/profiles.js';

const TEXT_INPUTS = "input[type='text'], input:not([type])";

describe('NavigationDriver', () => {
  let page: FakePage;
  let driver: NavigationDriver;

  beforeEach(() => {
    page = new FakePage();
    driver = new NavigationDriver(page);
  });

  describe('acceptCookies', () => {
    it('should click the first consent control present', async () => {
      page.element(COOKIE);
      expect(await driver.acceptCookies(["button:has-text('Agree')", COOKIE])).toBe(true);
      expect(page.actions).toEqual([`click:${COOKIE}`]);
      expect(page.waits).toEqual([200]);
    });

    it('should report false when there is no banner', async () => {
      expect(await driver.acceptCookies([COOKIE])).toBe(false);
      expect(page.actions).toEqual([]);
    });

    it('should treat a failing click as not found', async () => {
      page.element(COOKIE, { error: new Error('element is detached') });
      expect(await driver.acceptCookies([COOKIE])).toBe(false);
    });
  });

  describe('submitPostcode', () => {
    it('should type the postcode and click submit', async () => {
      page.element(POSTCODE_INPUT).element(SUBMIT);
      expect(await driver.submitPostcode('TW8 0FD', [POSTCODE_INPUT], [SUBMIT])).toBe(true);
      expect(page.actions).toEqual([
        `fill:${POSTCODE_INPUT}=`,
        `type:${POSTCODE_INPUT}=TW8 0FD`,
        `click:${SUBMIT}`,
      ]);
      expect(page.waits).toEqual([400]);
    });

    it('should press Enter when no submit control exists', async () => {
      page.element(POSTCODE_INPUT);
      expect(await driver.submitPostcode('TW8 0FD', [POSTCODE_INPUT], [SUBMIT])).toBe(true);
      expect(page.actions[2]).toBe(`press:${POSTCODE_INPUT}=Enter`);
    });

    it('should report false without a postcode field', async () => {
      page.element(SUBMIT);
      expect(await driver.submitPostcode('TW8 0FD', [POSTCODE_INPUT], [SUBMIT])).toBe(false);
      expect(page.actions).toEqual([]);
    });
  });

  describe('resolveAddressPicker', () => {
    beforeEach(() => {
      page.element('select', { count: 1 });
      page.element('select >> option', { texts: ['Select your address', '1 High Street', '2 High Street'] });
    });

    it('should pick the option containing the hint', async () => {
      expect(await driver.resolveAddressPicker('2 high', 1)).toBe(true);
      expect(page.actions).toEqual(['select:select=2 High Street']);
    });

    it('should pick by 1-based index without a hint', async () => {
      expect(await driver.resolveAddressPicker(null, 2)).toBe(true);
      expect(page.actions).toEqual(['select:select=1 High Street']);
    });

    it('should clamp the index to the list', async () => {
      expect(await driver.resolveAddressPicker(null, 9)).toBe(true);
      expect(page.actions).toEqual(['select:select=2 High Street']);
    });

    it('should pick from a listbox when there is no usable select', async () => {
      page.remove('select').remove('select >> option');
      const options = "[role='listbox'] [role='option']";
      page.element(options, { texts: ['10 Kew Road', '12 Kew Road'] });

      expect(await driver.resolveAddressPicker('12 kew', 1)).toBe(true);
      expect(page.actions).toEqual([`click:${options}=#1`]);
    });

    it('should continue after picking', async () => {
      page.element(CONTINUE);
      await driver.resolveAddressPicker(null, 1);
      expect(page.actions).toEqual(['select:select=Select your address', `click:${CONTINUE}`]);
    });
  });

  describe('answerMovingQuestion', () => {
    it('should leave the question alone for a null answer', async () => {
      page.element('label:has-text("I live here")');
      expect(await driver.answerMovingQuestion(null)).toBe(false);
      expect(page.actions).toEqual([]);
    });

    it('should click the moving label and continue', async () => {
      page.element('label:has-text("I am moving to this address")').element(CONTINUE);
      expect(await driver.answerMovingQuestion(true)).toBe(true);
      expect(page.actions).toEqual([`click:label:has-text("I am moving to this address")`, `click:${CONTINUE}`]);
    });

    it('should check a radio by aria label when no label matches', async () => {
      page.element(`input[type='radio'][aria-label*="I live here"]`);
      expect(await driver.answerMovingQuestion(false)).toBe(true);
      expect(page.actions).toEqual([`check:input[type='radio'][aria-label*="I live here"]`]);
    });

    it('should quote phrases containing apostrophes', async () => {
      page.element(`label:has-text("I'm moving to this address")`);
      expect(await driver.answerMovingQuestion(true)).toBe(true);
    });
  });

  describe('fillAdditionalFields', () => {
    it('should fill a field through its label', async () => {
      page.element('label:has-text("Flat number")', { attributes: { for: 'flat' } });
      page.element('[id="flat"]');
      expect(await driver.fillAdditionalFields({ 'Flat number': '12' })).toBe(true);
      expect(page.actions).toEqual(['fill:[id="flat"]=12']);
    });

    it('should default empty address-like inputs to 1', async () => {
      page.element(TEXT_INPUTS, { count: 2 });
      page.element(`${TEXT_INPUTS} >> xpath=preceding::label[1]`, { texts: ['House number'] });
      expect(await driver.fillAdditionalFields({})).toBe(true);
      expect(page.actions).toEqual([`fill:${TEXT_INPUTS}=1`, `fill:${TEXT_INPUTS}=1`]);
    });

    it('should leave unrelated inputs empty', async () => {
      page.element(TEXT_INPUTS, { count: 1 });
      page.element(`${TEXT_INPUTS} >> xpath=preceding::label[1]`, { texts: ['Email'] });
      expect(await driver.fillAdditionalFields({})).toBe(false);
      expect(page.actions).toEqual([]);
    });

    it('should leave filled inputs alone', async () => {
      page.element(TEXT_INPUTS, { count: 1, value: '7' });
      expect(await driver.fillAdditionalFields({})).toBe(false);
    });
  });

  describe('results', () => {
    it('should see a result marker', async () => {
      page.element(RESULT);
      expect(await driver.hasAnyResult(["[data-component*='product' i]", RESULT])).toBe(true);
    });

    it('should settle when no marker appears', async () => {
      expect(await driver.waitForAnyResult([RESULT])).toBe(false);
      expect(page.waits).toEqual([4000]);
    });

    it('should stop waiting at the first marker', async () => {
      page.element(RESULT);
      expect(await driver.waitForAnyResult([RESULT])).toBe(true);
      expect(page.waits).toEqual([]);
    });

    it('should race every marker within one budget', async () => {
      const markers = ['.plans', '.deals', '.offers'];
      expect(await driver.waitForAnyResult(markers, 8000)).toBe(false);

      expect(page.waitFors).toEqual(markers.map((selector) => ({ selector, timeout: 8000 })));
      expect(page.peakPendingWaits).toBe(3);
      expect(page.waits).toEqual([4000]);
    });

    it('should accept a later marker when earlier ones never appear', async () => {
      page.element('.deals');
      expect(await driver.waitForAnyResult(['.plans', '.deals', '.offers'])).toBe(true);
      expect(page.waits).toEqual([]);
    });
  });

  describe('runPreActions', () => {
    const cta = 'a:has-text("See deals")';
    const profile = testProfile({
      preCta: { selectors: [cta], landingPath: '/broadband' },
      directLink: 'https://www.example.com/broadband/buy',
    });

    it('should click through on the landing page and count the navigation', async () => {
      const counters: NavigationCounters = { gotoCount: 1, wizardSteps: 0 };
      page.currentUrl = 'https://www.example.com/broadband';
      page.element(cta);

      expect(await driver.runPreActions(profile, counters)).toBe(true);
      expect(counters.gotoCount).toBe(2);
      expect(page.loadStates).toEqual(['domcontentloaded']);
      expect(page.wheels).toEqual([[0, 400]]);
    });

    it('should skip the deep purchase path', async () => {
      const counters: NavigationCounters = { gotoCount: 1, wizardSteps: 0 };
      page.currentUrl = 'https://www.example.com/broadband/buy';
      page.element(cta);

      expect(await driver.runPreActions(profile, counters)).toBe(false);
      expect(counters.gotoCount).toBe(1);
      expect(page.actions).toEqual([]);
    });

    it('should do nothing for profiles without a call to action', async () => {
      const counters: NavigationCounters = { gotoCount: 0, wizardSteps: 0 };
      expect(await driver.runPreActions(testProfile(), counters)).toBe(false);
    });
  });
});
