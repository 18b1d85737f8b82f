/**
 * Forward-reference labels for code addresses.
 */

import { CodeBuilder } from "../bytecode/code.js";
import { invariant } from "./errors.js";

/**
 * Opaque handle to a code address that may not be known yet.
 */
export interface Label {
  readonly id: number;
}

type LabelState =
  | { kind: "placed"; address: number }
  | { kind: "pending"; offsets: number[] };

/**
 * Tracks labels and the operand slots waiting on them.
 *
 * Referencing a placed label writes its address immediately. Referencing an
 * unplaced one writes a placeholder and records the slot; placing the label
 * patches every recorded slot.
 */
export class LabelTable {
  private states: Map<number, LabelState> = new Map();
  private nextId: number = 0;

  /**
   * Create a new unplaced label.
   */
  create(): Label {
    const label: Label = { id: this.nextId++ };
    this.states.set(label.id, { kind: "pending", offsets: [] });
    return label;
  }

  /**
   * Bind a label to the builder's current offset and patch waiting slots.
   */
  place(label: Label, builder: CodeBuilder): number {
    const state = this.stateOf(label);
    invariant(state.kind === "pending", `label ${label.id} placed twice`);
    const address = builder.offset();
    for (const offset of state.offsets) {
      builder.patchU32(offset, address);
    }
    this.states.set(label.id, { kind: "placed", address });
    return address;
  }

  /**
   * Emit a 32-bit address operand for a label.
   */
  reference(label: Label, builder: CodeBuilder): void {
    const state = this.stateOf(label);
    if (state.kind === "placed") {
      builder.emitU32(state.address);
      return;
    }
    state.offsets.push(builder.emitU32(0));
  }

  /**
   * Address of a placed label.
   */
  addressOf(label: Label): number | undefined {
    const state = this.stateOf(label);
    return state.kind === "placed" ? state.address : undefined;
  }

  /**
   * Number of operand slots still waiting on an unplaced label.
   */
  pendingCount(): number {
    let count = 0;
    for (const state of this.states.values()) {
      if (state.kind === "pending") {
        count += state.offsets.length;
      }
    }
    return count;
  }

  /**
   * Fail if any referenced label was never placed.
   */
  assertResolved(): void {
    const pending = this.pendingCount();
    invariant(pending === 0, `${pending} unresolved label reference(s)`);
  }

  private stateOf(label: Label): LabelState {
    const state = this.states.get(label.id);
    invariant(state !== undefined, `unknown label ${label.id}`);
    return state;
  }
}
