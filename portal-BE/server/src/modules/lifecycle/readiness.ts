let draining = false

export function setDraining(value: boolean): void {
  draining = value
}

export function isDraining(): boolean {
  return draining
}
