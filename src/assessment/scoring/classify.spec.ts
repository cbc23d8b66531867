import { classifyApplicant } from './classify';
import { createMockAnswers } from 'src/test/factories/mock-assessment.factory';

describe('classifyApplicant', () => {
  it('falls back to other when nothing is ticked', () => {
    expect(classifyApplicant(createMockAnswers())).toBe('other');
  });

  it('picks green once environmental signals reach the threshold', () => {
    const answers = createMockAnswers({
      tracksEnvMetrics: true,
      measuresEmissions: true,
    });
    expect(classifyApplicant(answers)).toBe('green');
  });

  it('picks sll when sustainability goals are set', () => {
    const answers = createMockAnswers({ hasSustainabilityGoals: true });
    expect(classifyApplicant(answers)).toBe('sll');
  });

  it('counts half a point of sll for significant energy use', () => {
    const answers = createMockAnswers({
      consumesSignificantEnergy: true,
      appliedForEsgLoan: true,
      hasEmployeePolicies: true,
    });
    // green 1, sll 2.5
    expect(classifyApplicant(answers)).toBe('sll');
  });

  it('stays on other when neither score is high enough', () => {
    const answers = createMockAnswers({
      isManufacturing: true,
      consumesSignificantEnergy: true,
    });
    // green 2, sll 0.5
    expect(classifyApplicant(answers)).toBe('other');
  });

  it('prefers green when both thresholds are met', () => {
    const answers = createMockAnswers({
      isManufacturing: true,
      consumesSignificantEnergy: true,
      tracksEnvMetrics: true,
      measuresEmissions: true,
      hasSustainabilityGoals: true,
      appliedForEsgLoan: true,
      hasEmployeePolicies: true,
    });
    expect(classifyApplicant(answers)).toBe('green');
  });
});
