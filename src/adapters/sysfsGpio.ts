import fs from "node:fs";
import path from "node:path";

export type GpioDirection = "in" | "out";
export type GpioLevel = 0 | 1;

/**
 * One BCM pin through the Linux sysfs GPIO interface (`<root>/gpioN/value`).
 * All calls are synchronous; a value read or write is a single small file op.
 */
export class SysfsGpioLine {
  readonly pin: number;
  readonly direction: GpioDirection;
  private readonly root: string;

  constructor(params: { root: string; pin: number; direction: GpioDirection }) {
    this.root = params.root;
    this.pin = params.pin;
    this.direction = params.direction;
  }

  private get pinDir(): string {
    return path.join(this.root, `gpio${this.pin}`);
  }

  export(): void {
    if (!fs.existsSync(this.pinDir)) {
      fs.writeFileSync(path.join(this.root, "export"), String(this.pin));
    }
    if (!fs.existsSync(this.pinDir)) {
      throw new Error(`GPIO ${this.pin} did not appear under ${this.root} after export`);
    }
    fs.writeFileSync(path.join(this.pinDir, "direction"), this.direction);
  }

  read(): GpioLevel {
    const raw = fs.readFileSync(path.join(this.pinDir, "value"), "utf-8").trim();
    if (raw === "0") return 0;
    if (raw === "1") return 1;
    throw new Error(`GPIO ${this.pin} returned unexpected value ${JSON.stringify(raw)}`);
  }

  write(level: GpioLevel): void {
    if (this.direction !== "out") {
      throw new Error(`GPIO ${this.pin} is an input`);
    }
    fs.writeFileSync(path.join(this.pinDir, "value"), String(level));
  }

  unexport(): void {
    fs.writeFileSync(path.join(this.root, "unexport"), String(this.pin));
  }
}
