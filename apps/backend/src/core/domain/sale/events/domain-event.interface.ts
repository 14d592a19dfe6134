export interface DomainEvent {
  readonly occurredOn: Date;
}
