export interface ConfirmRequest {
  title: string;
  message: string;
  confirmLabel?: string;
  variant?: 'danger' | 'default';
}

/** Resolves true only when the user explicitly accepts. */
export type Confirm = (request: ConfirmRequest) => Promise<boolean>;
