import type {
  BreakdownItem,
  GreenIntake,
  IntakeSubmission,
  OtherIntake,
  Rating,
  Scorecard,
  SllIntake,
  Suggestion,
} from '../types/assessment';

export const MAX_SCORE = 100;

export const SUGGESTIONS = {
  solar: {
    text: 'Install rooftop solar to start your renewable energy journey.',
    icon: '☀️',
  },
  energyAudit: {
    text: 'Consider an energy audit to identify reduction opportunities.',
    icon: '⚡',
  },
  fleet: {
    text: 'Explore EV fleet transition or fuel-efficient logistics.',
    icon: '🚗',
  },
  water: {
    text: 'Implement rainwater harvesting and water recycling.',
    icon: '💧',
  },
  waste: {
    text: 'Implement waste segregation and partner with recyclers.',
    icon: '♻️',
  },
  equipment: {
    text: 'Invest in BEE-rated equipment and LED lighting.',
    icon: '💡',
  },
  goals: {
    text: "Define quantifiable targets (e.g., 'Reduce energy by 15% in 3 years').",
    icon: '🎯',
  },
  safety: {
    text: 'Strengthen ISO 45001 safety protocols to reach zero incidents.',
    icon: '⛑️',
  },
  diversity: {
    text: 'Track and report workforce diversity metrics.',
    icon: '👥',
  },
  governance: {
    text: 'Formalize Anti-Corruption and Whistleblower policies.',
    icon: '📜',
  },
  training: {
    text: 'Implement regular skill development and safety training.',
    icon: '📚',
  },
  documentation: {
    text: "Start documenting your processes - it's the foundation of ESG.",
    icon: '📋',
  },
  quickWins: {
    text: 'Explore quick wins: LED lighting, waste segregation, water metering.',
    icon: '🌱',
  },
  trackBills: {
    text: 'Start tracking monthly electricity and fuel bills.',
    icon: '📊',
  },
  msmeSchemes: {
    text: 'Check if your industry is eligible for MSME green schemes.',
    icon: '🏭',
  },
} satisfies Record<string, Suggestion>;

const GREEN_SECTOR_PREFIXES = ['35', '38', '39']; // electricity, waste, remediation
const GOVERNANCE_KEYWORDS = [
  'anti-corruption',
  'whistleblower',
  'ethics',
  'compliance',
  'audit',
];
const CERTIFICATION_KEYWORDS = [
  'iso',
  'bis',
  'fssai',
  'gmp',
  'haccp',
  'ohsas',
  'sa8000',
];
const INTEREST_KEYWORDS = [
  'water',
  'energy',
  'waste',
  'solar',
  'recycle',
  'carbon',
  'green',
];

/** Collects points and advice while the rules of one track run. */
class ScoreSheet {
  readonly breakdown: BreakdownItem[] = [];
  readonly suggestions: Suggestion[] = [];

  add(label: string, points: number, advice?: Suggestion) {
    this.breakdown.push({ label, points });
    if (advice) this.suggestions.push(advice);
  }

  get total(): number {
    return this.breakdown.reduce((sum, item) => sum + item.points, 0);
  }
}

function hasDetail(text: string | undefined): boolean {
  return (text ?? '').length > 5;
}

function countKeywords(text: string, keywords: string[]): number {
  const haystack = text.toLowerCase();
  return keywords.filter((kw) => haystack.includes(kw)).length;
}

function scoreGreen(data: GreenIntake, sheet: ScoreSheet) {
  const renewable = data.renewableEnergyPct;
  if (renewable > 50) sheet.add('Renewable Energy', 25);
  else if (renewable >= 25) sheet.add('Renewable Energy', 18);
  else if (renewable >= 10) sheet.add('Renewable Energy', 10);
  else if (renewable > 0) sheet.add('Renewable Energy', 5);
  else sheet.add('Renewable Energy', 0, SUGGESTIONS.solar);

  const elec = data.annualElectricityKwh;
  if (elec < 10_000) sheet.add('Energy Efficiency', 15);
  else if (elec < 50_000) sheet.add('Energy Efficiency', 10);
  else if (elec < 100_000) sheet.add('Energy Efficiency', 5);
  else sheet.add('Energy Efficiency', 0, SUGGESTIONS.energyAudit);

  const fuel = data.annualFuelLitres;
  if (fuel < 1_000) sheet.add('Fuel Efficiency', 15);
  else if (fuel < 5_000) sheet.add('Fuel Efficiency', 10);
  else if (fuel < 10_000) sheet.add('Fuel Efficiency', 5);
  else sheet.add('Fuel Efficiency', 0, SUGGESTIONS.fleet);

  const water = data.waterConsumptionLitres;
  if (water < 50_000) sheet.add('Water Management', 10);
  else if (water < 100_000) sheet.add('Water Management', 7);
  else if (water < 500_000) sheet.add('Water Management', 3);
  else sheet.add('Water Management', 0, SUGGESTIONS.water);

  const waste = data.wasteGeneratedKgMonth;
  if (waste < 100) sheet.add('Waste Reduction', 15);
  else if (waste < 500) sheet.add('Waste Reduction', 10);
  else if (waste < 1_000) sheet.add('Waste Reduction', 5);
  else sheet.add('Waste Reduction', 0, SUGGESTIONS.waste);

  if (hasDetail(data.efficiencyEquipment)) sheet.add('Green Technology', 15);
  else sheet.add('Green Technology', 0, SUGGESTIONS.equipment);

  const industry = data.industryCode ?? '';
  const greenSector = GREEN_SECTOR_PREFIXES.some((p) => industry.startsWith(p));
  sheet.add('Sector Bonus', greenSector ? 5 : 0);
}

function scoreSll(data: SllIntake, sheet: ScoreSheet) {
  const goals = data.targetImprovementGoals;
  const quantified = /\d+%|\d+ percent/.test(goals.toLowerCase());
  if (quantified && goals.length > 30) sheet.add('Goal Clarity', 20);
  else if (goals.length > 20) sheet.add('Goal Clarity', 10);
  else sheet.add('Goal Clarity', 0, SUGGESTIONS.goals);

  const incidents = data.safetyIncidentCount;
  if (incidents === 0) sheet.add('Safety Record', 25);
  else if (incidents <= 2) sheet.add('Safety Record', 15);
  else if (incidents <= 5) sheet.add('Safety Record', 5);
  else sheet.add('Safety Record', 0, SUGGESTIONS.safety);

  if (hasDetail(data.workforceDiversityStats)) {
    sheet.add('Diversity Tracking', 15);
  } else {
    sheet.add('Diversity Tracking', 0, SUGGESTIONS.diversity);
  }

  const governance = data.governancePolicies ?? '';
  const matches = countKeywords(governance, GOVERNANCE_KEYWORDS);
  if (matches >= 2) sheet.add('Governance', 20);
  else if (matches === 1 || governance.length > 20) sheet.add('Governance', 10);
  else sheet.add('Governance', 0, SUGGESTIONS.governance);

  if (hasDetail(data.trainingPrograms)) sheet.add('Employee Training', 10);
  else sheet.add('Employee Training', 0, SUGGESTIONS.training);

  const employees = data.numEmployees;
  if (employees > 50) sheet.add('Organization Scale', 10);
  else if (employees >= 20) sheet.add('Organization Scale', 7);
  else sheet.add('Organization Scale', 5);
}

function scoreOther(data: OtherIntake, sheet: ScoreSheet) {
  const info = data.businessInfo;
  if (info.length > 100) sheet.add('Business Clarity', 20);
  else if (info.length > 30) sheet.add('Business Clarity', 10);
  else sheet.add('Business Clarity', 5);

  const docs = data.existingDocs ?? '';
  const docMatches = countKeywords(docs, CERTIFICATION_KEYWORDS);
  if (docMatches >= 2) sheet.add('Documentation', 40);
  else if (docMatches === 1 || docs.length > 30) sheet.add('Documentation', 20);
  else sheet.add('Documentation', 0, SUGGESTIONS.documentation);

  const interests = countKeywords(data.interestAreas ?? '', INTEREST_KEYWORDS);
  if (interests >= 3) sheet.add('Sustainability Interest', 40);
  else if (interests >= 1) sheet.add('Sustainability Interest', 20);
  else sheet.add('Sustainability Interest', 10, SUGGESTIONS.quickWins);

  if (sheet.suggestions.length === 0) {
    sheet.suggestions.push(SUGGESTIONS.trackBills, SUGGESTIONS.msmeSchemes);
  }
}

export function ratingFor(score: number): Rating {
  if (score >= 80) return 'A';
  if (score >= 60) return 'B';
  if (score >= 40) return 'C';
  return 'D';
}

export function generateScorecard(submission: IntakeSubmission): Scorecard {
  const sheet = new ScoreSheet();

  switch (submission.category) {
    case 'green':
      scoreGreen(submission.data, sheet);
      break;
    case 'sll':
      scoreSll(submission.data, sheet);
      break;
    case 'other':
      scoreOther(submission.data, sheet);
      break;
  }

  const score = Math.min(Math.round(sheet.total), MAX_SCORE);
  return {
    score,
    rating: ratingFor(score),
    breakdown: sheet.breakdown,
    suggestions: sheet.suggestions,
  };
}
