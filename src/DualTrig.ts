import { Dual } from './Dual';
import { DualArithmetic } from './DualArithmetic';
import { DomainError } from './Errors';

export class DualTrig {
  static sin(x: Dual): Dual {
    return DualArithmetic.chain(x, Math.sin(x.value), () => Math.cos(x.value), `sin(${x.label})`);
  }

  static cos(x: Dual): Dual {
    return DualArithmetic.chain(x, Math.cos(x.value), () => -Math.sin(x.value), `cos(${x.label})`);
  }

  static tan(x: Dual): Dual {
    return DualArithmetic.chain(x, Math.tan(x.value), () => 1 / (Math.cos(x.value) ** 2), `tan(${x.label})`);
  }

  static asin(x: Dual): Dual {
    DualTrig.assertUnitInterval(x, 'asin');
    return DualArithmetic.chain(
      x,
      Math.asin(x.value),
      () => 1 / Math.sqrt(1 - x.value * x.value),
      `asin(${x.label})`
    );
  }

  static acos(x: Dual): Dual {
    DualTrig.assertUnitInterval(x, 'acos');
    return DualArithmetic.chain(
      x,
      Math.acos(x.value),
      () => -1 / Math.sqrt(1 - x.value * x.value),
      `acos(${x.label})`
    );
  }

  static atan(x: Dual): Dual {
    return DualArithmetic.chain(x, Math.atan(x.value), () => 1 / (1 + x.value * x.value), `atan(${x.label})`);
  }

  private static assertUnitInterval(x: Dual, fn: string): void {
    if (x.value < -1 || x.value > 1) {
      throw new DomainError(`${fn} undefined outside [-1, 1]: ${x.value}`);
    }
  }
}
