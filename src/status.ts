/**
 * One reading of the watched mailbox.
 */
export interface Observation {
  unread: number;
  total: number;
}

export type StatusFormat = "i3bar" | "waybar";

/** Color i3bar uses for the block while unread mail is present. */
export const ACCENT_COLOR = "#ffff00";

function label({ unread, total }: Observation): string {
  return `(${unread}) ${total}`;
}

/**
 * Render an observation as the single-line JSON object a status bar
 * reads. The caller adds the line terminator.
 */
export function renderStatus(observation: Observation, format: StatusFormat): string {
  const hasUnread = observation.unread > 0;

  switch (format) {
    case "i3bar":
      return JSON.stringify({
        full_text: label(observation),
        color: hasUnread ? ACCENT_COLOR : "",
      });
    case "waybar":
      return JSON.stringify({
        text: label(observation),
        alt: String(hasUnread),
      });
  }
}
