/**
 * Expo Outreach Agents
 *
 * @module @expo-outreach/agents
 */

// Outreach Agent - also available as a subpath import
// import { OutreachAgent } from '@expo-outreach/agents/outreach';
export * from './outreach';
