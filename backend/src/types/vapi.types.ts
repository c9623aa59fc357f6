/**
 * Webhook events pushed by the Vapi voice platform. Only the fields the
 * transcript producer reads are modelled.
 */
export interface VapiTranscriptEvent {
    type: 'transcript';
    transcript: string;
    transcriptType?: 'partial' | 'final';
    speaker?: string;
    call?: { id: string };
    timestamp?: string;
}

export interface VapiLifecycleEvent {
    type: 'conversation-start' | 'conversation-end';
    call?: { id: string };
}

export type VapiWebhookEvent = VapiTranscriptEvent | VapiLifecycleEvent;
