import { Slot } from './types';

export interface SlotPreference {
  day: string;
  startHour: number;
}

function pad(hour: number): string {
  return String(hour).padStart(2, '0');
}

/** 8 -> "08:00-09:00", the label the overview page uses for a one-hour slot. */
export function formatTimeSlot(hour: number): string {
  return `${pad(hour)}:00-${pad(hour + 1)}:00`;
}

/**
 * First open slot in page order on the wanted day whose label is exactly the
 * one-hour slot starting at the wanted hour. `14:30-15:30` or `14:00-16:00`
 * do not match 14. Several courts at the same time are equivalent, so the
 * first one wins.
 */
export function findMatchingSlot(slots: Slot[], preference: SlotPreference): Slot | undefined {
  const label = formatTimeSlot(preference.startHour);
  return slots.find(
    (slot) =>
      slot.open &&
      slot.bookingUrl !== undefined &&
      slot.day === preference.day &&
      slot.startHour === preference.startHour &&
      slot.time === label
  );
}
