// Counter reset functions - call in beforeEach to ensure test isolation
let recordCounter = 0;

export function resetRecordCounter(): void {
  recordCounter = 0;
}

export function resetFactories(): void {
  resetRecordCounter();
}

export function getNextRecordId(): number {
  return ++recordCounter;
}
