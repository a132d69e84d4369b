export const CONFIRMATION_TOKEN = '1';

export const ConversationReplies = {
    confirmPrompt: (transcript: string) =>
        `I heard: **${transcript}**\n\nTo confirm this transcription and fill the database, **REPLY WITH ${CONFIRMATION_TOKEN}**.`,
    logged: '✅ Database filled! Delivery details have been successfully logged to the Google Sheet, and reminders calculated.',
    logFailed: "❌ ERROR: Failed to log data to the Google Sheet. Ensure the worksheet name is configured correctly and the service account has edit access.",
    parseFailed: (transcript: string) =>
        `❌ ERROR: The transcription could not be parsed into fields. Please ensure the voice note follows the expected format. Transcription received: ${transcript}`,
    nothingPending: "I didn't find any pending transcription to confirm. Please send a voice note first.",
    downloadFailed: '❌ ERROR: Could not download the voice message. Check Twilio settings or the media URL.',
    transcriptionFailed: 'Sorry, I could not transcribe the voice message. Please try again with a clearer recording.',
    help: `Welcome! Please send a voice note with the delivery details, or reply '${CONFIRMATION_TOKEN}' to confirm a pending transcription.`,
    serviceUnavailable: '⚠️ The service is temporarily unavailable. Please try again later.',
    unexpectedFault: '❌ Something went wrong while handling your message. Please try again.'
} as const;
