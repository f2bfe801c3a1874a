/**
 * CameraInfo - a camera as listed by a backend
 */

export interface CameraInfoInit {
  humanName: string;
  description: string;
  /** Backend-specific extra data, e.g. "<groupId>:<deviceId>" in browsers */
  misc: string;
  index: number;
}

export class CameraInfo {
  readonly humanName: string;
  readonly description: string;
  readonly misc: string;
  readonly index: number;

  constructor(init: CameraInfoInit) {
    this.humanName = init.humanName;
    this.description = init.description;
    this.misc = init.misc;
    this.index = init.index;
  }

  static compare(a: CameraInfo, b: CameraInfo): number {
    return a.index - b.index;
  }

  toString(): string {
    return `Name: ${this.humanName}, Description: ${this.description}, Extra: ${this.misc}, Index: ${this.index}`;
  }

  toJSON(): CameraInfoInit {
    return {
      humanName: this.humanName,
      description: this.description,
      misc: this.misc,
      index: this.index,
    };
  }
}
