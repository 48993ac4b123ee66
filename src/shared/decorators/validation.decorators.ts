import { TagType } from '../../core/metadata/tags/tag-type';
import { tagProperty } from '../../core/metadata/tags/tag-storage';

export interface MessageOptions {
  /** Replaces the built-in message. */
  message?: string;
}

export interface BoundOptions extends MessageOptions {
  value: number;
}

export interface LengthOptions extends MessageOptions {
  min?: number;
  max?: number;
}

export interface PatternOptions extends MessageOptions {
  regexp: string;
  flags?: string;
}

export const NotNullTag = new TagType<MessageOptions>('NotNull');
export const NotBlankTag = new TagType<MessageOptions>('NotBlank');
export const MinTag = new TagType<BoundOptions>('Min');
export const MaxTag = new TagType<BoundOptions>('Max');
export const LengthTag = new TagType<LengthOptions>('Length');
export const EmailTag = new TagType<MessageOptions>('Email');
export const PatternTag = new TagType<PatternOptions>('Pattern');

export const NotNull = (options: MessageOptions = {}): PropertyDecorator => tagProperty(NotNullTag.of(options));

export const NotBlank = (options: MessageOptions = {}): PropertyDecorator => tagProperty(NotBlankTag.of(options));

export const Min = (value: number, options: MessageOptions = {}): PropertyDecorator =>
  tagProperty(MinTag.of({ ...options, value }));

export const Max = (value: number, options: MessageOptions = {}): PropertyDecorator =>
  tagProperty(MaxTag.of({ ...options, value }));

export const Length = (options: LengthOptions): PropertyDecorator => tagProperty(LengthTag.of(options));

export const Email = (options: MessageOptions = {}): PropertyDecorator => tagProperty(EmailTag.of(options));

export function Pattern(pattern: RegExp | string, options: MessageOptions = {}): PropertyDecorator {
  const { source, flags } = typeof pattern === 'string' ? { source: pattern, flags: undefined } : pattern;
  return tagProperty(PatternTag.of({ ...options, regexp: source, flags: flags || undefined }));
}
