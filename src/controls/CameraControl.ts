/**
 * CameraControl - a bounded, stepped device setting
 */

import { StructureError } from '../types/errors.js';
import {
  compareKnownCameraControls,
  type CameraControlFlag,
  type KnownCameraControl,
} from './known-controls.js';

export interface CameraControlInit {
  control: KnownCameraControl;
  minimum: number;
  maximum: number;
  value: number;
  step: number;
  defaultValue: number;
  flag: CameraControlFlag;
  active: boolean;
}

/**
 * Check a value against the control's range and step.
 * The range is exclusive on both ends.
 */
function validateControlValue(value: number, minimum: number, maximum: number, step: number): void {
  if (![value, minimum, maximum, step].every(Number.isInteger)) {
    throw new StructureError('CameraControl', 'Value must be an integer');
  }
  if (value >= maximum) {
    throw new StructureError('CameraControl', 'Value too large');
  }
  if (value <= minimum) {
    throw new StructureError('CameraControl', 'Value too low');
  }
  // x % 0 is NaN, so a zero step never aligns
  if (value % step !== 0) {
    throw new StructureError('CameraControl', 'Not aligned with step');
  }
}

export class CameraControl {
  readonly control: KnownCameraControl;
  readonly minimum: number;
  readonly maximum: number;
  readonly step: number;
  readonly defaultValue: number;
  readonly flag: CameraControlFlag;
  readonly active: boolean;
  private _value: number;

  constructor(init: CameraControlInit) {
    validateControlValue(init.value, init.minimum, init.maximum, init.step);
    if (!Number.isInteger(init.defaultValue)) {
      throw new StructureError('CameraControl', 'Value must be an integer');
    }

    this.control = init.control;
    this.minimum = init.minimum;
    this.maximum = init.maximum;
    this.step = init.step;
    this.defaultValue = init.defaultValue;
    this.flag = init.flag;
    this.active = init.active;
    this._value = init.value;
  }

  static compare(a: CameraControl, b: CameraControl): number {
    return compareKnownCameraControls(a.control, b.control);
  }

  get value(): number {
    return this._value;
  }

  /**
   * Validate and assign in place. A rejected value leaves the control unchanged.
   */
  setValue(value: number): void {
    validateControlValue(value, this.minimum, this.maximum, this.step);
    this._value = value;
  }

  withValue(value: number): CameraControl {
    return new CameraControl({ ...this.toJSON(), value });
  }

  /**
   * Every step from minimum to maximum, inclusive
   */
  validValues(): number[] {
    const stride = Math.abs(this.step);
    const values: number[] = [];
    for (let v = this.minimum; v <= this.maximum; v += stride) {
      values.push(v);
    }
    return values;
  }

  toJSON(): CameraControlInit {
    return {
      control: this.control,
      minimum: this.minimum,
      maximum: this.maximum,
      value: this._value,
      step: this.step,
      defaultValue: this.defaultValue,
      flag: this.flag,
      active: this.active,
    };
  }
}
