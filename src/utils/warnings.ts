export class WarningCollector {
  private readonly list: string[] = [];
  private dropped = 0;

  constructor(private readonly limit = 500) {}

  add(message: string): void {
    if (this.list.length < this.limit) this.list.push(message);
    else this.dropped++;
  }

  toArray(): string[] {
    return this.dropped > 0 ? [...this.list, `${this.dropped} further warnings omitted`] : this.list.slice();
  }
}
