export enum SlackSinkActivationStatus {
  Inactive = 0,
  Active = 1,
}

/**
 * Runtime on/off switch for a Slack sink.
 *
 * The status lives in a SharedArrayBuffer and is read and written with
 * Atomics, so one switch can be handed to worker threads
 * (`SlackSinkActivationSwitch.fromSharedBuffer(other.sharedBuffer)`) and
 * flipped from any of them.
 */
export class SlackSinkActivationSwitch {
  readonly sharedBuffer: SharedArrayBuffer;
  private readonly cell: Int32Array;

  /**
   * @param source - initial status for a new switch, or the buffer of an
   * existing switch to attach to (its current status is kept)
   */
  constructor(source: SlackSinkActivationStatus | SharedArrayBuffer = SlackSinkActivationStatus.Active) {
    if (source instanceof SharedArrayBuffer) {
      if (source.byteLength < Int32Array.BYTES_PER_ELEMENT) {
        throw new RangeError('Activation switch buffer must hold at least one Int32');
      }
      this.sharedBuffer = source;
      this.cell = new Int32Array(source, 0, 1);
      return;
    }

    this.sharedBuffer = new SharedArrayBuffer(Int32Array.BYTES_PER_ELEMENT);
    this.cell = new Int32Array(this.sharedBuffer);
    Atomics.store(this.cell, 0, source);
  }

  static fromSharedBuffer(buffer: SharedArrayBuffer): SlackSinkActivationSwitch {
    return new SlackSinkActivationSwitch(buffer);
  }

  get status(): SlackSinkActivationStatus {
    return Atomics.load(this.cell, 0) === SlackSinkActivationStatus.Active
      ? SlackSinkActivationStatus.Active
      : SlackSinkActivationStatus.Inactive;
  }

  setActive(): void {
    Atomics.store(this.cell, 0, SlackSinkActivationStatus.Active);
  }

  setInactive(): void {
    Atomics.store(this.cell, 0, SlackSinkActivationStatus.Inactive);
  }

  isActive(): boolean {
    return this.status === SlackSinkActivationStatus.Active;
  }
}
