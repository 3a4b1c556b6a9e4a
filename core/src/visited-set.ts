/**
 * Identity-keyed bookkeeping for one traversal pass.
 *
 * Each object instance can be claimed once; each (owner, field) slot can be
 * claimed once. A new set is created for every save or load call.
 */
export class VisitedSet {
  private readonly objects = new WeakSet<object>();
  private readonly slots = new WeakMap<object, Set<string>>();

  /**
   * Claim an object for this pass. Returns false if it was already claimed.
   */
  claim(target: object): boolean {
    if (this.objects.has(target)) return false;

    this.objects.add(target);
    return true;
  }

  /**
   * Claim one field of one object. Returns false if it was already claimed.
   */
  claimSlot(owner: object, fieldName: string): boolean {
    let fields = this.slots.get(owner);
    if (!fields) {
      fields = new Set();
      this.slots.set(owner, fields);
    }
    if (fields.has(fieldName)) return false;

    fields.add(fieldName);
    return true;
  }
}
