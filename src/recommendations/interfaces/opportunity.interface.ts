export interface Opportunity {
  id: string | number;
  teamName: string;
  sport: string;
  odds?: number | string | null;
  probability?: number | null;
  sportId?: number;
  eventDate?: string;
}

export interface ResolvedOpportunity extends Opportunity {
  odds: number;
  probability: number;
}
