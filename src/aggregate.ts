import { compareSerials } from './lib/canon.js';
import { normalizeCampaignDate } from './lib/dates.js';
import { parseAltitudeMeters } from './lib/tolerant.js';
import type { ResolvedCampaign, ResolvedPilot } from './resolve.js';
import type {
  Ace,
  Achievement,
  CampaignTotals,
  CareerProfile,
  PilotStatistics,
  VictoryEvent,
  VictorySource
} from './types/index.js';

export interface CampaignAggregate {
  stats: ReadonlyMap<string, PilotStatistics>;
  careers: ReadonlyMap<string, CareerProfile>;
  squadronVictories: ReadonlyMap<string, number>;
  aces: Ace[];
  achievements: Achievement[];
  totals: CampaignTotals;
}

export const ACE_THRESHOLD = 5;
export const VETERAN_THRESHOLD = 50;

function sortedCounts(values: Iterable<string>): Record<string, number> {
  const counts = new Map<string, number>();
  for (const value of values) counts.set(value, (counts.get(value) ?? 0) + 1);
  const result: Record<string, number> = {};
  for (const key of [...counts.keys()].sort()) result[key] = counts.get(key) ?? 0;
  return result;
}

function victoryEvents(pilot: ResolvedPilot): { events: VictoryEvent[]; count: number; source: VictorySource } {
  const reported = pilot.combatReports.flatMap((report) => report.data.victories);
  if (reported.length) {
    return { events: reported, count: reported.length, source: 'combat-reports' };
  }
  if (pilot.ace) {
    const listed = pilot.ace.victories;
    if (listed) return { events: listed, count: listed.length, source: 'aces' };
    return { events: [], count: Math.max(0, Math.floor(pilot.ace.victoryCount ?? 0)), source: 'aces' };
  }
  if (pilot.rosterVictoryCount !== undefined) {
    return { events: [], count: pilot.rosterVictoryCount, source: 'personnel' };
  }
  return { events: [], count: 0, source: 'none' };
}

export function computePilotStatistics(pilot: ResolvedPilot): PilotStatistics {
  const sorties = new Set(pilot.combatReports.map((report) => report.data.missionId)).size;
  const { events, count, source } = victoryEvents(pilot);
  const losses = pilot.combatReports.reduce((sum, report) => sum + (report.data.losses ?? 0), 0);
  const categorized = events.flatMap((event) => (event.category ? [event.category] : []));
  return {
    sorties,
    victories: count,
    victoriesByCategory: sortedCounts(categorized),
    losses,
    victoryRatio: count / Math.max(sorties, 1),
    victorySource: source,
    partialData: pilot.partial || pilot.combatReports.some((report) => report.status === 'partial')
  };
}

/** Career summary drawn from a pilot's combat reports; undefined without reports. */
export function computeCareer(pilot: ResolvedPilot): CareerProfile | undefined {
  if (!pilot.combatReports.length) return undefined;
  const reports = pilot.combatReports.map((report) => report.data);

  const altitudes = reports.flatMap((report) => {
    const meters = parseAltitudeMeters(report.altitude);
    return meters === undefined ? [] : [meters];
  });
  const dates = reports.flatMap((report) => {
    const date = normalizeCampaignDate(report.date);
    return date ? [date] : [];
  });

  return {
    aircraftTypes: [...new Set(reports.flatMap((report) => (report.aircraft ? [report.aircraft] : [])))].sort(),
    duties: sortedCounts(reports.flatMap((report) => (report.duty ? [report.duty] : []))),
    localities: [...new Set(reports.flatMap((report) => (report.locality ? [report.locality] : [])))].sort(),
    averageAltitudeMeters: altitudes.length
      ? Math.round(altitudes.reduce((sum, value) => sum + value, 0) / altitudes.length)
      : undefined,
    lastMissionDate: dates.length ? dates.sort()[dates.length - 1] : undefined
  };
}

/**
 * Pilots with at least one victory plus every pilot listed in the aces file, most
 * victories first; equal counts order by serial ascending, so the ranking is total.
 */
export function rankAces(pilots: readonly ResolvedPilot[], stats: ReadonlyMap<string, PilotStatistics>): Ace[] {
  return pilots
    .flatMap((pilot) => {
      const victories = stats.get(pilot.serialNumber)?.victories ?? 0;
      return victories >= 1 || pilot.ace ? [{ pilot, victories }] : [];
    })
    .sort((a, b) => b.victories - a.victories || compareSerials(a.pilot.serialNumber, b.pilot.serialNumber))
    .map(({ pilot, victories }, index) => ({
      position: index + 1,
      serialNumber: pilot.serialNumber,
      name: pilot.name,
      victories,
      squadronId: pilot.squadronId
    }));
}

export function evaluateAchievements(stats: PilotStatistics | undefined): Achievement[] {
  const victories = stats?.victories ?? 0;
  const sorties = stats?.sorties ?? 0;
  return [
    {
      id: 'first-victory',
      title: 'First Blood',
      description: 'Score a first confirmed victory.',
      unlocked: victories >= 1
    },
    {
      id: 'ace',
      title: 'Ace',
      description: `Reach ${ACE_THRESHOLD} confirmed victories.`,
      unlocked: victories >= ACE_THRESHOLD
    },
    {
      id: 'veteran',
      title: 'Veteran',
      description: `Fly ${VETERAN_THRESHOLD} sorties.`,
      unlocked: sorties >= VETERAN_THRESHOLD
    }
  ];
}

/** Recomputes every derived figure from the resolved campaign. Pure. */
export function aggregateCampaign(resolved: ResolvedCampaign): CampaignAggregate {
  const stats = new Map<string, PilotStatistics>();
  const careers = new Map<string, CareerProfile>();
  for (const pilot of resolved.pilots) {
    stats.set(pilot.serialNumber, computePilotStatistics(pilot));
    const career = computeCareer(pilot);
    if (career) careers.set(pilot.serialNumber, career);
  }

  const squadronVictories = new Map<string, number>();
  for (const squadron of resolved.squadrons) {
    squadronVictories.set(
      squadron.id,
      squadron.roster.reduce((sum, serial) => sum + (stats.get(serial)?.victories ?? 0), 0)
    );
  }

  const reference = resolved.pilots.find((pilot) => pilot.isReference);
  const all = [...stats.values()];

  return {
    stats,
    careers,
    squadronVictories,
    aces: rankAces(resolved.pilots, stats),
    achievements: evaluateAchievements(reference ? stats.get(reference.serialNumber) : undefined),
    totals: {
      pilots: resolved.pilots.length,
      squadrons: resolved.squadrons.length,
      missions: resolved.missions.length,
      sorties: all.reduce((sum, entry) => sum + entry.sorties, 0),
      victories: all.reduce((sum, entry) => sum + entry.victories, 0),
      losses: all.reduce((sum, entry) => sum + entry.losses, 0)
    }
  };
}
