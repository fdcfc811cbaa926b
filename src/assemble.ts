import type { CampaignAggregate } from './aggregate.js';
import { normalizeCampaignDate, yearsBetween } from './lib/dates.js';
import type { ResolvedCampaign } from './resolve.js';
import type { AnnotationRecord, Pilot, PilotAnnotation, PilotStatistics, UnifiedCampaignModel } from './types/index.js';

export type AnnotationLookup = (serialNumber: string) => AnnotationRecord | undefined;

const EMPTY_STATS: PilotStatistics = {
  sorties: 0,
  victories: 0,
  victoriesByCategory: {},
  losses: 0,
  victoryRatio: 0,
  victorySource: 'none',
  partialData: false
};

function annotate(record: AnnotationRecord | undefined, asOf: string | undefined): PilotAnnotation | undefined {
  if (!record) return undefined;
  return {
    ...record,
    ageAtLastMission: yearsBetween(normalizeCampaignDate(record.birthDate), asOf)
  };
}

/**
 * Merges the resolved records, the derived figures and the user's annotations into the
 * model handed to presentation and export. Pure; annotations are copied, never changed.
 */
export function assembleModel(
  resolved: ResolvedCampaign,
  aggregate: CampaignAggregate,
  lookupAnnotation: AnnotationLookup
): UnifiedCampaignModel {
  const pilots: Pilot[] = resolved.pilots.map((pilot) => {
    const career = aggregate.careers.get(pilot.serialNumber);
    return {
      serialNumber: pilot.serialNumber,
      name: pilot.name,
      rank: pilot.rank,
      squadronId: pilot.squadronId,
      status: pilot.status,
      isReference: pilot.isReference,
      missionsFlownReported: pilot.missionsFlownReported,
      stats: aggregate.stats.get(pilot.serialNumber) ?? { ...EMPTY_STATS, victoriesByCategory: {} },
      career,
      annotation: annotate(
        lookupAnnotation(pilot.serialNumber),
        career?.lastMissionDate ?? resolved.campaign.date
      ),
      sources: [...pilot.sources]
    };
  });

  return {
    campaign: { ...resolved.campaign },
    pilots,
    squadrons: resolved.squadrons.map((squadron) => ({
      id: squadron.id,
      name: squadron.name,
      roster: [...squadron.roster],
      totalVictories: aggregate.squadronVictories.get(squadron.id) ?? 0,
      recentActivity: [...squadron.log]
    })),
    aces: aggregate.aces,
    missions: resolved.missions,
    campaignLog: resolved.campaignLog,
    achievements: aggregate.achievements,
    totals: aggregate.totals
  };
}
