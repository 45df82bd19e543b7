// lib/gridsim/core/arena.ts
// Stable-slot registry: removal deactivates a slot, the slot list never shrinks,
// so a snapshot taken at tick start survives self-destruction mid-iteration.

type Slot<T> = { item: T; active: boolean };

export class AgentArena<T extends { readonly id: number }> {
  private slots: Slot<T>[] = [];
  private byId = new Map<number, number>();

  insert(item: T): void {
    this.byId.set(item.id, this.slots.length);
    this.slots.push({ item, active: true });
  }

  has(id: number): boolean {
    const i = this.byId.get(id);
    return i !== undefined && this.slots[i].active;
  }

  get(id: number): T | undefined {
    const i = this.byId.get(id);
    if (i === undefined || !this.slots[i].active) return undefined;
    return this.slots[i].item;
  }

  // Returns false when there was nothing active to remove.
  deactivate(id: number): boolean {
    const i = this.byId.get(id);
    if (i === undefined || !this.slots[i].active) return false;
    this.slots[i].active = false;
    this.byId.delete(id);
    return true;
  }

  active(): T[] {
    const out: T[] = [];
    for (const s of this.slots) if (s.active) out.push(s.item);
    return out;
  }

  find(pred: (item: T) => boolean): T | undefined {
    for (const s of this.slots) if (s.active && pred(s.item)) return s.item;
    return undefined;
  }

  get activeCount(): number {
    return this.byId.size;
  }

  get slotCount(): number {
    return this.slots.length;
  }
}
