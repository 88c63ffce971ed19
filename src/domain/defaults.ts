export interface BotDefaults {
  Total_Interactions: number;
  Positive_Feedback_Count: number;
  Negative_Feedback_Count: number;
  Level_of_Access: string;
  Active_Status: string;
  Version: string;
  Owner_Maintainer: string;
  Foundation_Business: string;
  Foundation_Name: string;
  Last_Updated: string;
}

export interface KnowledgeEntryDefaults {
  Content: string;
  Metadata: string;
}

export interface BotDefaultsOptions {
  /** Owner and foundation fields are pre-filled with this value. */
  owner: string;
  now?: Date;
}

/** YYYY-MM-DD in local time. */
export function formatDay(date: Date): string {
  const month = String(date.getMonth() + 1).padStart(2, "0");
  const day = String(date.getDate()).padStart(2, "0");
  return `${date.getFullYear()}-${month}-${day}`;
}

export function botDefaults(options: BotDefaultsOptions): BotDefaults {
  return {
    Total_Interactions: 0,
    Positive_Feedback_Count: 0,
    Negative_Feedback_Count: 0,
    Level_of_Access: "Full",
    Active_Status: "Active",
    Version: "1.0",
    Owner_Maintainer: options.owner,
    Foundation_Business: options.owner,
    Foundation_Name: options.owner,
    Last_Updated: formatDay(options.now ?? new Date()),
  };
}

export function knowledgeEntryDefaults(): KnowledgeEntryDefaults {
  return {
    Content: "Sample Document",
    Metadata: "Sample Metadata",
  };
}

/** Empty strings are stored as null, never as the literal "". */
export function blankToNull<V>(value: V): V | null {
  return value === "" ? null : value;
}

/**
 * Overlay caller values on defaults. Keys the caller left undefined keep their
 * default; keys the caller blanked out become null.
 */
export function withDefaults<D extends object>(
  defaults: D,
  values: Readonly<Record<string, unknown>>,
): Record<string, unknown> {
  const merged: Record<string, unknown> = Object.fromEntries(Object.entries(defaults));
  for (const [key, value] of Object.entries(values)) {
    if (value === undefined) continue;
    merged[key] = blankToNull(value);
  }
  return merged;
}
