export class Mp4CodecError extends Error {
	constructor(message: string) {
		super(message);
		this.name = new.target.name;
	}
}

/** The bytes do not describe the structure the decoder expected. */
export class MalformedDataError extends Mp4CodecError {}

/** A read, write or seek went outside the bounds of the byte stream. */
export class StreamError extends Mp4CodecError {}
