import type { Tool, ToolConfiguration } from '@aws-sdk/client-bedrock-runtime';
import { MEDICATION_ROUTES, URGENCY_LEVELS, CLINICAL_SETTINGS } from '@clinorder/shared';

/**
 * Bedrock Converse tool the model is forced to call. Its input schema is the
 * JSON-schema rendering of ClinicalStructure; the tool input is parsed with
 * ClinicalStructureSchema on the way back.
 */
export const CLINICAL_STRUCTURE_TOOL_NAME = 'record_clinical_structure';

const stringList = { type: 'array', items: { type: 'string' } };
const nullableString = { type: ['string', 'null'] };

export const clinicalStructureTool: Tool = {
  toolSpec: {
    name: CLINICAL_STRUCTURE_TOOL_NAME,
    description: 'Record the medical orders, conditions and patients stated in the clinical text.',
    inputSchema: {
      json: {
        type: 'object',
        properties: {
          medications: {
            type: 'array',
            items: {
              type: 'object',
              properties: {
                name: { type: 'string' },
                dosage: nullableString,
                frequency: nullableString,
                route: { type: 'string', enum: [...MEDICATION_ROUTES] },
                indication: nullableString,
                duration: nullableString,
                special_instructions: stringList,
              },
              required: ['name'],
            },
          },
          lab_tests: {
            type: 'array',
            items: {
              type: 'object',
              properties: {
                name: { type: 'string' },
                test_type: { type: 'string' },
                urgency: { type: 'string', enum: [...URGENCY_LEVELS] },
                fasting_required: { type: 'boolean' },
                special_instructions: stringList,
                expected_turnaround: nullableString,
              },
              required: ['name'],
            },
          },
          procedures: {
            type: 'array',
            items: {
              type: 'object',
              properties: {
                name: { type: 'string' },
                procedure_type: { type: 'string' },
                urgency: { type: 'string', enum: [...URGENCY_LEVELS] },
                body_site: nullableString,
                contrast_needed: { type: 'boolean' },
                special_prep: stringList,
              },
              required: ['name'],
            },
          },
          conditions: {
            type: 'array',
            items: {
              type: 'object',
              properties: {
                name: { type: 'string' },
                severity: nullableString,
                onset: nullableString,
                status: { type: 'string' },
              },
              required: ['name'],
            },
          },
          patients: stringList,
          clinical_instructions: stringList,
          urgency_level: { type: 'string', enum: [...URGENCY_LEVELS] },
          clinical_setting: { type: 'string', enum: [...CLINICAL_SETTINGS] },
          patient_safety_alerts: stringList,
        },
        required: ['medications', 'conditions', 'patients'],
      },
    },
  },
};

export const clinicalStructureToolConfig: ToolConfiguration = {
  tools: [clinicalStructureTool],
  toolChoice: { tool: { name: CLINICAL_STRUCTURE_TOOL_NAME } },
};
