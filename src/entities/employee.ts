import type { Employee, Position } from '../core/types.js';
import { POSITIONS } from '../core/constants.js';

export function createEmployee(id: string, name: string, position: Position): Employee {
  const { salary, maxAnimals } = POSITIONS[position];
  return { id, name, position, salary, maxAnimals, currentAnimals: 0 };
}

export function isProtected(employee: Employee): boolean {
  return employee.position === 'Director';
}

export function dismissableEmployees(employees: Employee[]): Employee[] {
  return employees.filter((e) => !isProtected(e));
}
