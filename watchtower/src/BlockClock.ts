export interface BlockReader {
  getBlock(): Promise<{ timestamp: bigint }>
}

export interface Clock {
  now(): Promise<bigint>
}

// Current time as seen by the chain. Never goes backwards, even if a lagging node answers.
class BlockClock implements Clock {
  private client: BlockReader
  private latest: bigint

  constructor(client: BlockReader) {
    this.client = client
    this.latest = 0n
  }

  async now(): Promise<bigint> {
    const { timestamp } = await this.client.getBlock()
    if (timestamp > this.latest) this.latest = timestamp
    return this.latest
  }
}

export default BlockClock
