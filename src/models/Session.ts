import mongoose from 'mongoose';
import { SerializedSession } from '../services/SessionCodec';

export interface SessionDocument {
  sessionId: string;
  currentState: string;
  payload: SerializedSession;
  lastActivityAt: Date;
}

const SessionSchema = new mongoose.Schema<SessionDocument>(
  {
    sessionId: { type: String, required: true, unique: true },
    currentState: { type: String, required: true },
    payload: { type: mongoose.Schema.Types.Mixed, required: true },
    lastActivityAt: { type: Date, required: true, index: true },
  },
  { timestamps: true, collection: 'sessions', minimize: false }
);

export default mongoose.model<SessionDocument>('Session', SessionSchema);
