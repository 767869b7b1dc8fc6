import type { MarketOpportunity, OpportunityType } from '@/lib/types';

export const OPPORTUNITY_LABELS: Record<OpportunityType, string> = {
  whitespace: 'Whitespace',
  innovation: 'Innovation Areas',
  pricing: 'Pricing Opportunities',
  niche: 'Niche Markets',
};

const ORDER: OpportunityType[] = ['whitespace', 'innovation', 'pricing', 'niche'];

export interface OpportunityGroup {
  type: OpportunityType;
  label: string;
  items: { category: string; description: string }[];
}

/** Groups the opportunity map by type in a fixed order, skipping empty groups. */
export function groupOpportunities(map: MarketOpportunity[]): OpportunityGroup[] {
  return ORDER.map((type) => ({
    type,
    label: OPPORTUNITY_LABELS[type],
    items: map
      .filter((o) => o.type === type)
      .map(({ category, description }) => ({ category, description })),
  })).filter((group) => group.items.length > 0);
}
