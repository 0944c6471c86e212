// Export Enums
export * from './enums';

// Export DTOs
export * from './dto/persona.dto';
export * from './dto/template.dto';
export * from './dto/context.dto';
export * from './dto/nudge.dto';
export * from './dto/error.dto';
