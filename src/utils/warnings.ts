export type WarningRecord = {
  message: string;
  source?: string;
  recorded_at: string;
};

export type WarningSink = {
  warn: (message: string, source?: string) => void;
};

export const createConsoleWarningSink = (): WarningSink => ({
  warn: (message: string, source?: string) => {
    if (source) {
      console.warn(`[${source}] ${message}`);
    } else {
      console.warn(message);
    }
  }
});

/** Collects warnings in memory; used where no bus exists yet, e.g. config resolution. */
export const createBufferedWarningSink = (): WarningSink & { drain: () => WarningRecord[] } => {
  const records: WarningRecord[] = [];
  return {
    warn: (message: string, source?: string) => {
      records.push({ message, source, recorded_at: new Date().toISOString() });
    },
    drain: () => records.splice(0, records.length)
  };
};
