import type { WeatherSnapshot } from './records.js';

export type PilotStatus =
  | 'active'
  | 'resting'
  | 'wounded'
  | 'hospital'
  | 'missing'
  | 'killed'
  | 'transferred';

export type VictorySource = 'combat-reports' | 'aces' | 'personnel' | 'none';

export interface PilotStatistics {
  sorties: number;
  victories: number;
  victoriesByCategory: Record<string, number>;
  losses: number;
  victoryRatio: number;
  victorySource: VictorySource;
  /** True when any record feeding these numbers was only partially decoded. */
  partialData: boolean;
}

export interface CareerProfile {
  aircraftTypes: string[];
  duties: Record<string, number>;
  localities: string[];
  averageAltitudeMeters?: number;
  lastMissionDate?: string;
}

export interface AnnotationRecord {
  serialNumber: string;
  birthDate?: string;
  birthPlace?: string;
  notes?: string;
  photoRef?: string;
}

export interface PilotAnnotation extends AnnotationRecord {
  ageAtLastMission?: number;
}

export interface Pilot {
  serialNumber: string;
  name: string;
  rank?: string;
  squadronId?: string;
  status?: PilotStatus;
  isReference: boolean;
  missionsFlownReported?: number;
  stats: PilotStatistics;
  career?: CareerProfile;
  annotation?: PilotAnnotation;
  sources: string[];
}

export interface LogEntry {
  date?: string;
  rawDate?: string;
  text: string;
  squadronId?: string;
  sourcePath: string;
}

export interface Squadron {
  id: string;
  name?: string;
  roster: string[];
  totalVictories: number;
  recentActivity: LogEntry[];
}

export interface MissionCombatReport {
  sourcePath: string;
  narrative?: string;
  haReport?: string;
  victories: number;
  losses: number;
}

export interface MissionHistoryEntry {
  missionId: string;
  origin: 'mission-data' | 'combat-report';
  date?: string;
  time?: string;
  squadronId?: string;
  squadronName?: string;
  aircraft?: string;
  duty?: string;
  airfield?: string;
  altitudeMeters?: number;
  description?: string;
  participants: string[];
  unresolvedParticipants: string[];
  combatReport?: MissionCombatReport;
  weather?: WeatherSnapshot;
  sourcePath: string;
}

export interface Ace {
  position: number;
  serialNumber: string;
  name: string;
  victories: number;
  squadronId?: string;
}

export type AchievementId = 'first-victory' | 'ace' | 'veteran';

export interface Achievement {
  id: AchievementId;
  title: string;
  description: string;
  unlocked: boolean;
}

export interface CampaignInfo {
  name: string;
  date?: string;
  rawDate?: string;
  referencePilotSerial?: string;
  referenceSquadronId?: string;
  product?: string;
}

export interface CampaignTotals {
  pilots: number;
  squadrons: number;
  missions: number;
  sorties: number;
  victories: number;
  losses: number;
}

/** The single object handed to presentation and export collaborators. */
export interface UnifiedCampaignModel {
  campaign: CampaignInfo;
  pilots: Pilot[];
  squadrons: Squadron[];
  aces: Ace[];
  missions: MissionHistoryEntry[];
  campaignLog: LogEntry[];
  achievements: Achievement[];
  totals: CampaignTotals;
}
