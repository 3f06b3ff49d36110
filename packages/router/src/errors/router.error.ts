export class RouterError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);

    this.name = 'RouterError';
  }
}
