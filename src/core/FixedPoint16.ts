/** Unsigned 16.16 fixed-point number: 16 integer bits followed by 16 fractional bits. */
export class FixedPoint16 {
	readonly raw: number;

	private constructor(raw: number) {
		this.raw = raw;
	}

	static fromRaw(raw: number): FixedPoint16 {
		if (!Number.isInteger(raw) || raw < 0 || raw > 0xffffffff) {
			throw new RangeError(`16.16 raw value out of range: ${raw}`);
		}
		return new FixedPoint16(raw);
	}

	static fromInteger(value: number): FixedPoint16 {
		if (!Number.isInteger(value) || value < 0 || value > 0xffff) {
			throw new RangeError(`16.16 integer part out of range: ${value}`);
		}
		return new FixedPoint16((value * 0x10000) >>> 0);
	}

	static fromNumber(value: number): FixedPoint16 {
		return FixedPoint16.fromRaw(Math.round(value * 0x10000));
	}

	get integer(): number {
		return this.raw >>> 16;
	}

	get fraction(): number {
		return this.raw & 0xffff;
	}

	get value(): number {
		return this.raw / 0x10000;
	}

	toJSON(): number {
		return this.raw;
	}
}
