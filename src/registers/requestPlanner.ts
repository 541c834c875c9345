import type { RegisterDescriptor, RegisterKind } from "./definitions";

// Modbus limit for FC 0x03 / 0x04
export const MAX_REGISTERS_PER_REQUEST = 125;

export interface PlanOptions {
  maxRegistersPerRequest?: number;
  /** Unused registers allowed between two descriptors that still share a request. */
  maxGap?: number;
}

export interface RequestGroup {
  kind: RegisterKind;
  start: number;
  count: number;
  descriptors: readonly RegisterDescriptor[];
}

const KIND_ORDER: Record<RegisterKind, number> = { holding: 0, input: 1 };

export function compareDescriptors(a: RegisterDescriptor, b: RegisterDescriptor): number {
  return (
    KIND_ORDER[a.kind] - KIND_ORDER[b.kind] ||
    a.address - b.address ||
    b.wordCount - a.wordCount ||
    a.key.localeCompare(b.key)
  );
}

/**
 * Partitions descriptors into as few read requests as possible. Ranges of the
 * same register kind are merged when they touch, overlap, or are separated by
 * at most `maxGap` registers, as long as the merged span fits in one request.
 */
export function groupIntoRequests(
  descriptors: readonly RegisterDescriptor[],
  options: PlanOptions = {},
): RequestGroup[] {
  const maxCount = options.maxRegistersPerRequest ?? MAX_REGISTERS_PER_REQUEST;
  const maxGap = options.maxGap ?? 0;

  if (!Number.isInteger(maxCount) || maxCount < 2 || maxCount > MAX_REGISTERS_PER_REQUEST) {
    throw new RangeError(`maxRegistersPerRequest must be between 2 and ${MAX_REGISTERS_PER_REQUEST}`);
  }
  if (!Number.isInteger(maxGap) || maxGap < 0) {
    throw new RangeError("maxGap must be a non-negative integer");
  }

  const sorted = [...descriptors].sort(compareDescriptors);
  const groups: RequestGroup[] = [];

  let current: { kind: RegisterKind; start: number; end: number; members: RegisterDescriptor[] } | null =
    null;

  for (const descriptor of sorted) {
    const end = descriptor.address + descriptor.wordCount - 1;
    if (
      current &&
      current.kind === descriptor.kind &&
      descriptor.address <= current.end + 1 + maxGap &&
      Math.max(current.end, end) - current.start + 1 <= maxCount
    ) {
      current.end = Math.max(current.end, end);
      current.members.push(descriptor);
      continue;
    }

    if (current) {
      groups.push(toGroup(current));
    }
    current = { kind: descriptor.kind, start: descriptor.address, end, members: [descriptor] };
  }

  if (current) {
    groups.push(toGroup(current));
  }
  return groups;
}

function toGroup(span: {
  kind: RegisterKind;
  start: number;
  end: number;
  members: RegisterDescriptor[];
}): RequestGroup {
  return {
    kind: span.kind,
    start: span.start,
    count: span.end - span.start + 1,
    descriptors: span.members,
  };
}

/** Words belonging to one descriptor inside a group's response. */
export function sliceWords(
  group: RequestGroup,
  descriptor: RegisterDescriptor,
  words: readonly number[],
): number[] {
  const offset = descriptor.address - group.start;
  return words.slice(offset, offset + descriptor.wordCount);
}
