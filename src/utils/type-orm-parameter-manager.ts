/**
 * Hands out parameter names that are unique within one translated query,
 * including the parameters of correlated subqueries.
 */
export class TypeOrmParameterManager {
  private paramCounter = 0;

  generateParamName(): string {
    return `param_${this.paramCounter++}`;
  }
}
