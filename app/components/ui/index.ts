export { Alert, type AlertProps } from './Alert'
export { Button, type ButtonProps } from './Button'
export { Input, Select, TextArea, type InputProps, type SelectOption, type SelectProps, type TextAreaProps } from './Field'
export { EmptyState, JsonView, Section, type EmptyStateProps, type SectionProps } from './Panel'
export { Tabs, type TabItem } from './Tabs'
