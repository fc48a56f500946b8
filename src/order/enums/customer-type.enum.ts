export enum CustomerType {
  STUDENT = 'STUDENT',
  TEACHER = 'TEACHER',
}
