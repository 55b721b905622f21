/**
 * Thrown when a host is constructed with options it cannot run with.
 */
export class NodeHostConfigError extends Error {
  constructor(
    public readonly option: string,
    public readonly reason: string
  ) {
    super(`NodeMidiHost option "${option}": ${reason}`)
    this.name = 'NodeHostConfigError'
  }
}
