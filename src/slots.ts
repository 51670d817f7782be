import type { VTAPConfig } from './config.js';

/** Key slots shared by VAS and Smart Tap private keys */
export const KEY_SLOTS: readonly number[] = [1, 2, 3, 4, 5, 6];

/**
 * A pass entry to leave out of a slot query, usually the one being edited
 */
export interface SlotExclusion {
  section: 'vas' | 'smarttap';
  index: number;
}

interface SlotClaim {
  slot: number;
  owner: string;
}

function claims(config: VTAPConfig, exclude?: SlotExclusion): SlotClaim[] {
  const skip = (section: SlotExclusion['section'], index: number): boolean =>
    exclude?.section === section && exclude.index === index;

  const result: SlotClaim[] = [];
  config.vasConfigs.forEach((vas, i) => {
    if (!skip('vas', i)) {
      result.push({ slot: vas.keySlot, owner: `VAS #${i + 1}` });
    }
  });
  config.smartTapConfigs.forEach((st, i) => {
    if (!skip('smarttap', i) && st.hasKeySlot) {
      result.push({ slot: st.keySlot, owner: `SmartTap #${i + 1}` });
    }
  });
  return result;
}

/**
 * Key slots in use, mapped to the entry holding them (e.g. "VAS #1").
 *
 * VAS entries are visited before Smart Tap entries and a later entry
 * replaces an earlier owner of the same slot. Smart Tap entries without a
 * key slot are ignored. Advisory only: nothing prevents two entries sharing
 * a slot.
 */
export function usedSlots(config: VTAPConfig, exclude?: SlotExclusion): Map<number, string> {
  const used = new Map<number, string>();
  for (const { slot, owner } of claims(config, exclude)) {
    used.set(slot, owner);
  }
  return used;
}

/**
 * Slots claimed by more than one entry, with every claimant in visiting order
 */
export function slotConflicts(config: VTAPConfig): Map<number, string[]> {
  const owners = new Map<number, string[]>();
  for (const { slot, owner } of claims(config)) {
    owners.set(slot, [...(owners.get(slot) ?? []), owner]);
  }
  return new Map([...owners].filter(([, list]) => list.length > 1));
}

/**
 * Summary line such as "Used: 1 (VAS #1), 3 (SmartTap #1) | Free: 2, 4, 5, 6"
 */
export function slotInfoText(used: ReadonlyMap<number, string>): string {
  const usedParts = [...used.keys()]
    .filter((slot) => slot > 0)
    .sort((a, b) => a - b)
    .map((slot) => `${slot} (${used.get(slot) ?? ''})`);
  const free = KEY_SLOTS.filter((slot) => !used.has(slot));

  const parts: string[] = [];
  if (usedParts.length > 0) {
    parts.push(`Used: ${usedParts.join(', ')}`);
  }
  if (free.length > 0) {
    parts.push(`Free: ${free.join(', ')}`);
  }
  return parts.join(' | ');
}
