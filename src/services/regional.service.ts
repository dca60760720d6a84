export type RegionClassification = 'eligible' | 'interest' | 'unknown';

export interface RegionConfig {
  eligibleRegions: readonly string[];
  interestRegions: readonly string[];
}

export interface RegionStatus {
  region: string | null;
  status: RegionClassification;
  description: string;
}

export interface RegionListEntry {
  code: string;
  name: string;
  status: 'available' | 'interest';
}

// Brazilian states -> macro-region
const STATE_REGIONS: Record<string, string> = {
  RS: 'sul',
  SC: 'sul',
  PR: 'sul',
  SP: 'sudeste',
  RJ: 'sudeste',
  MG: 'sudeste',
  ES: 'sudeste',
  GO: 'centro-oeste',
  MT: 'centro-oeste',
  MS: 'centro-oeste',
  DF: 'centro-oeste',
  BA: 'nordeste',
  PE: 'nordeste',
  CE: 'nordeste',
  RN: 'nordeste',
  PB: 'nordeste',
  AL: 'nordeste',
  SE: 'nordeste',
  PI: 'nordeste',
  MA: 'nordeste',
  AP: 'norte',
  AM: 'norte',
  RR: 'norte',
  AC: 'norte',
  TO: 'norte',
  PA: 'norte',
  RO: 'norte',
};

function titleCase(value: string): string {
  return value.replace(/(^|[\s-])(\p{L})/gu, (_match, sep: string, letter: string) => sep + letter.toUpperCase());
}

function normalizeCode(code: string | null | undefined): string | null {
  const trimmed = code?.trim();
  return trimmed ? trimmed.toUpperCase() : null;
}

/**
 * Classifies region codes against the eligible and interest sets it was
 * built with. Holds no other state.
 */
export class RegionalValidator {
  private readonly eligible: ReadonlySet<string>;
  private readonly interest: ReadonlySet<string>;
  private readonly eligibleOrder: string[];
  private readonly interestOrder: string[];

  constructor(config: RegionConfig) {
    this.eligibleOrder = config.eligibleRegions.map((r) => normalizeCode(r)).filter((r): r is string => r !== null);
    this.interestOrder = config.interestRegions.map((r) => normalizeCode(r)).filter((r): r is string => r !== null);
    this.eligible = new Set(this.eligibleOrder);
    this.interest = new Set(this.interestOrder);
  }

  classify(code: string | null | undefined): RegionClassification {
    const region = normalizeCode(code);
    if (!region) return 'unknown';
    if (this.eligible.has(region)) return 'eligible';
    if (this.interest.has(region)) return 'interest';
    return 'unknown';
  }

  isEligible(code: string | null | undefined): boolean {
    return this.classify(code) === 'eligible';
  }

  describe(code: string | null | undefined): RegionStatus {
    const region = normalizeCode(code);
    if (!region) {
      return { region: null, status: 'unknown', description: 'Região não informada' };
    }

    const status = this.classify(region);
    const name = titleCase(STATE_REGIONS[region] ?? 'desconhecida');

    switch (status) {
      case 'eligible':
        return { region, status, description: `Elegível - Região ${name}` };
      case 'interest':
        return { region, status, description: `Região em avaliação - ${name}` };
      default:
        return { region, status, description: `Região ${region} desconhecida` };
    }
  }

  listEligible(): RegionListEntry[] {
    return this.eligibleOrder.map((code) => ({
      code,
      name: titleCase(STATE_REGIONS[code] ?? code),
      status: 'available' as const,
    }));
  }

  listInterest(): RegionListEntry[] {
    return this.interestOrder.map((code) => ({
      code,
      name: titleCase(STATE_REGIONS[code] ?? code),
      status: 'interest' as const,
    }));
  }
}
