// Counter reset functions - call in beforeEach to ensure test isolation
let jobCounter = 0;
let clusterCounter = 0;
let tableCounter = 0;

export function resetFactories(): void {
  jobCounter = 0;
  clusterCounter = 0;
  tableCounter = 0;
}

export function getNextJobId(): number {
  return ++jobCounter;
}

export function getNextClusterId(): number {
  return ++clusterCounter;
}

export function getNextTableId(): number {
  return ++tableCounter;
}
