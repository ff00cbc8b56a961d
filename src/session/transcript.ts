/**
 * Append-only capture of everything read from the console, in arrival order.
 * Sealing freezes the text; later appends are rejected.
 */
export class Transcript {
  private readonly units: string[] = []
  private size = 0
  private sealedText: string | null = null

  append(unit: string): void {
    if (this.sealedText !== null) {
      throw new Error("Transcript is sealed; the session has already ended.")
    }
    if (unit.length === 0) return
    this.units.push(unit)
    this.size += unit.length
  }

  get length(): number {
    return this.size
  }

  get sealed(): boolean {
    return this.sealedText !== null
  }

  text(): string {
    return this.sealedText ?? this.units.join("")
  }

  seal(): string {
    if (this.sealedText === null) {
      this.sealedText = this.units.join("")
      this.units.length = 0
    }
    return this.sealedText
  }
}
