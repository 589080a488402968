export type {
  EducationLevel,
  ListField,
  OccupationData,
  OccupationFamily,
  OccupationFields,
  OccupationInit,
  OccupationRecord,
} from './occupation'
export {
  computeCompleteness,
  createOccupation,
  EducationLevelSchema,
  emptyFields,
  familyForCode,
  isFieldPopulated,
  isListField,
  OccupationDraft,
  OccupationFamilySchema,
  OccupationSchema,
  populatedFields,
  updateOccupation,
} from './occupation'
