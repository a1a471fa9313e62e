export type CompletionMethod = "color_change" | "title_prefix";

export type CalendarDate = {
  year: number;
  month: number;
  day: number;
};

export type TimeOfDay = {
  hour: number;
  minute: number;
};

export type ScheduleEntry = {
  readonly name: string;
  readonly date: CalendarDate;
  readonly start: TimeOfDay;
  readonly end: TimeOfDay;
};

export type ColorRule = {
  pattern: string;
  colorId: string;
};

export type ColorScheme = {
  rules: ColorRule[];
  defaultColorId: string;
};

export type CompletionStrategy = {
  enabled: boolean;
  method: CompletionMethod;
};

export type CalendarEventTime = {
  dateTime: string;
  timeZone?: string;
};

export type CalendarEvent = {
  id?: string;
  summary: string;
  description?: string;
  colorId?: string;
  status?: string;
  start: CalendarEventTime;
  end: CalendarEventTime;
  extendedProperties?: {
    private?: Record<string, string>;
  };
};

export type EventPatch = Partial<Pick<CalendarEvent, "summary" | "colorId">>;

export type DateRange = {
  timeMin: string;
  timeMax: string;
};

export interface CalendarGateway {
  listEvents(args: { range?: DateRange; managedOnly: boolean }): Promise<CalendarEvent[]>;
  insert(event: CalendarEvent): Promise<string>;
  patch(id: string, fields: EventPatch): Promise<void>;
  delete(id: string): Promise<void>;
}

export type PlannedEvent = {
  entry: ScheduleEntry;
  event: CalendarEvent;
};

export type RecolorAction = {
  id: string;
  summary: string;
  colorId: string;
};

export type SyncPlan = {
  toCreate: PlannedEvent[];
  toSkip: string[];
  /** Parallel to `toSkip`: the entry each skipped key came from. */
  skippedEntries: ScheduleEntry[];
  toRecolor: RecolorAction[];
};

export type SyncFailure = {
  label: string;
  entry?: ScheduleEntry;
  reason: string;
};

export type SyncResult = {
  created: number;
  skipped: number;
  recolored: number;
  failed: SyncFailure[];
  plan: SyncPlan;
  dryRun: boolean;
};

export type ClearResult = {
  candidates: CalendarEvent[];
  deleted: number;
  failed: SyncFailure[];
  dryRun: boolean;
};

export type MarkDoneResult = {
  event: CalendarEvent;
  method: CompletionMethod;
  patch: EventPatch;
  dryRun: boolean;
};
