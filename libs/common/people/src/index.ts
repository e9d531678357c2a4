export * from './person.dto';
export * from './person.factory';
export * from './person-validation';
export * from './people.service';
export * from './people.module';
