/** Current bert release; compared against the latest GitHub release by `self-update`. */
export const VERSION = "0.3.0";
