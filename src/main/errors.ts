export type ModErrorKind =
  | 'NotFound'
  | 'AlreadyExists'
  | 'AccessDenied'
  | 'InvalidArchive'
  | 'NotADirectory'
  | 'ParseFailure'
  | 'NetworkFailure'
  | 'InstallFailed'
  | 'UninstallFailed'
  | 'NotConfigured'

export class ModManagerError extends Error {
  readonly kind: ModErrorKind

  constructor(kind: ModErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'ModManagerError'
    this.kind = kind
  }
}

export function isModManagerError(e: unknown, kind?: ModErrorKind): e is ModManagerError {
  return e instanceof ModManagerError && (kind === undefined || e.kind === kind)
}

export function isErrnoException(e: unknown): e is NodeJS.ErrnoException {
  return e instanceof Error && 'code' in e
}

export function isPermissionError(e: unknown): boolean {
  return isErrnoException(e) && (e.code === 'EACCES' || e.code === 'EPERM')
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e)
}
