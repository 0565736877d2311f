/**
 * Frames per wall-clock second. The reported value is the count of the
 * previous completed second and changes on the first frame of a new one;
 * after a gap longer than a second it drops to 0.
 */
export class FpsCounter {
  private second: number | null = null;
  private count = 0;
  private current = 0;

  constructor(private readonly now: () => number = () => Date.now()) {}

  get fps(): number {
    return this.current;
  }

  tick(): number {
    const second = Math.floor(this.now() / 1000);
    if (this.second === null) {
      this.second = second;
    } else if (second !== this.second) {
      this.current = second === this.second + 1 ? this.count : 0;
      this.second = second;
      this.count = 0;
    }
    this.count += 1;
    return this.current;
  }
}
