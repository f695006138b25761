import type { Tracker } from "./tracker";
import type { Task } from "./types";
import { formatClock } from "./timeUtils";

export function renderStatusLine(
  tracker: Tracker,
  describeTask: (task: Task) => string,
  lookupTask: (taskId: string) => Task | undefined
): string {
  const session = tracker.getActive();
  if (!session) {
    return "🕒 hourbook: idle";
  }

  const task = lookupTask(session.task_id);
  const taskLabel = task ? describeTask(task) : "Unknown task";
  const detail = session.description ? ` — ${session.description}` : "";
  return `🕑 ${taskLabel}${detail} (${formatClock(tracker.runningSeconds())})`;
}
