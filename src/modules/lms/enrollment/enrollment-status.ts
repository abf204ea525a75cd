export type EnrollmentStatus = 'pending' | 'active' | 'completed' | 'withdrawn';

export const ENROLLMENT_STATUSES: readonly EnrollmentStatus[] = ['pending', 'active', 'completed', 'withdrawn'];

// pending/active: cuentan para "una matrícula abierta por alumno y curso"
export const OPEN_STATUSES: readonly EnrollmentStatus[] = ['pending', 'active'];

const TRANSITIONS: Record<EnrollmentStatus, readonly EnrollmentStatus[]> = {
  pending: ['active', 'withdrawn'],
  active: ['completed', 'withdrawn'],
  completed: [],
  withdrawn: [],
};

export function canTransition(from: EnrollmentStatus, to: EnrollmentStatus) {
  return TRANSITIONS[from].includes(to);
}

/** Estados desde los que se puede llegar a `to` (filtro del update condicional). */
export function sourcesOf(to: EnrollmentStatus): EnrollmentStatus[] {
  return ENROLLMENT_STATUSES.filter((from) => canTransition(from, to));
}
