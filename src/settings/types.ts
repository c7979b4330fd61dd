import type { AttendanceThresholds } from "../types";

export interface AttendanceDigestSettings {
	/**
	 * Union/total multiplier for the grouping test. A meeting joins a group
	 * when `total * ratioThreshold > union`. Range: (0, 1).
	 */
	ratioThreshold: number;
	/** Minimum minutes for each attendance color. Strictly increasing. */
	attendanceThresholds: AttendanceThresholds;
	/** Use each export's topic as its group label when no label map is given. */
	trustTopics: boolean;
	/**
	 * Manual corrections: raw attendee label → roster name, for labels the
	 * resolver cannot place on its own.
	 */
	nameOverrides: Record<string, string>;
	debugMode: boolean;
}

export const DEFAULT_THRESHOLDS: AttendanceThresholds = {
	red: 0,
	yellow: 15,
	green: 30,
};

export const DEFAULT_SETTINGS: AttendanceDigestSettings = {
	ratioThreshold: 0.75,
	attendanceThresholds: DEFAULT_THRESHOLDS,
	trustTopics: false,
	nameOverrides: {},
	debugMode: false,
};
