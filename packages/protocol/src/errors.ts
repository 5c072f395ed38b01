/**
 * Raised by a dispatch registry when no module, the root module included, recognizes the
 * requested type or class name.
 */
export class DeserializationTypeNotFoundError extends Error {
  readonly requestedType: string;

  constructor(requestedType: string, message?: string) {
    super(message ?? `No deserialization found for type "${requestedType}".`);
    this.name = 'DeserializationTypeNotFoundError';
    this.requestedType = requestedType;
  }
}

/**
 * Raised when a value of an unregistered type is encoded.
 */
export class SerializationTypeNotFoundError extends Error {
  readonly valueType: string;

  constructor(valueType: string) {
    super(`No serialization found for values of type "${valueType}".`);
    this.name = 'SerializationTypeNotFoundError';
    this.valueType = valueType;
  }
}
