export type RecordStatus = 'complete' | 'partial';

/** A decoded source file together with where it came from. */
export interface LoadedRecord<T> {
  sourcePath: string;
  status: RecordStatus;
  data: T;
}

export type FileCategory =
  | 'campaign'
  | 'aces'
  | 'log'
  | 'combatReports'
  | 'missionData'
  | 'personnel'
  | 'missionFiles';

export interface CampaignSummaryRecord {
  name?: string;
  date?: string;
  referencePlayerSerialNumber?: string;
  squadronId?: string;
  product?: string;
}

export interface VictoryEvent {
  date?: string;
  category?: string;
  victim?: string;
}

export interface AceEntryRecord {
  serialNumber?: string;
  name?: string;
  rank?: string;
  country?: string;
  squadronId?: string;
  squadronName?: string;
  missionsFlown?: number;
  /** Present when the source lists individual victories. */
  victories?: VictoryEvent[];
  /** Present when the source only carries a count. */
  victoryCount?: number;
}

export interface LogEntryRecord {
  date?: string;
  text?: string;
  squadronId?: string;
}

export interface CombatReportRecord {
  /** Serial number taken from the containing CombatReports/<serial>/ folder. */
  folderSerial: string;
  missionId: string;
  pilotSerialNumber?: string;
  pilotName?: string;
  squadronName?: string;
  date?: string;
  time?: string;
  aircraft?: string;
  locality?: string;
  duty?: string;
  altitude?: string;
  haReport?: string;
  narrative?: string;
  flightPilots: string[];
  victories: VictoryEvent[];
  losses?: number;
}

export interface MissionParticipantRecord {
  serialNumber?: string;
  name?: string;
  rank?: string;
  squadronId?: string;
  missionsFlown?: number;
}

export interface MissionDataRecord {
  missionId: string;
  date?: string;
  time?: string;
  squadronId?: string;
  squadronName?: string;
  aircraft?: string;
  duty?: string;
  airfield?: string;
  altitudeMeters?: number;
  description?: string;
  participants: MissionParticipantRecord[];
}

export interface PersonnelMemberRecord {
  serialNumber?: string;
  name?: string;
  rank?: string;
  missionsFlown?: number;
  victoryCount?: number;
  statusCode?: number;
  statusText?: string;
}

export interface PersonnelRecord {
  squadronId: string;
  members: PersonnelMemberRecord[];
}

export interface WindLayer {
  altitude: number;
  direction: number;
  speed: number;
}

export interface WeatherSnapshot {
  sourcePath: string;
  time?: string;
  date?: string;
  cloudLevel?: number;
  cloudHeight?: number;
  cloudConfig?: string;
  precipitationLevel?: number;
  precipitationType?: number;
  temperature?: number;
  pressure?: number;
  haze?: number;
  layerFog?: number;
  turbulence?: number;
  seaState?: number;
  windLayers?: WindLayer[];
}

export interface LoadedCampaignFiles {
  root: string;
  campaign?: LoadedRecord<CampaignSummaryRecord>;
  aces?: LoadedRecord<AceEntryRecord[]>;
  log?: LoadedRecord<LogEntryRecord[]>;
  combatReports: LoadedRecord<CombatReportRecord>[];
  missions: LoadedRecord<MissionDataRecord>[];
  personnel: LoadedRecord<PersonnelRecord>[];
}
