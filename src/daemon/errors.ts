/**
 * Raised while the daemon is being set up: bad registrations, bad WSDL
 * callbacks. Never raised while dispatching.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}
