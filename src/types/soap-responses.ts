/**
 * Output arguments of the SOAP actions this service reads.
 * Values are strings exactly as the device sent them; empty elements come back as ''.
 */

export type ActionResult = Record<string, string>;

// AVTransport
export interface TransportInfo {
  CurrentTransportState: string;
  CurrentTransportStatus: string;
  CurrentSpeed: string;
}

export interface PositionInfo {
  Track: string;
  TrackDuration: string;
  TrackMetaData: string; // DIDL-Lite XML string
  TrackURI: string;
  RelTime: string;
  AbsTime: string;
}

export interface MediaInfo {
  NrTracks: string;
  MediaDuration: string;
  CurrentURI: string;
  CurrentURIMetaData: string; // DIDL-Lite XML string
  NextURI: string;
  NextURIMetaData: string;
}

export function toTransportInfo(result: ActionResult): TransportInfo {
  return {
    CurrentTransportState: result['CurrentTransportState'] ?? '',
    CurrentTransportStatus: result['CurrentTransportStatus'] ?? '',
    CurrentSpeed: result['CurrentSpeed'] ?? ''
  };
}

export function toPositionInfo(result: ActionResult): PositionInfo {
  return {
    Track: result['Track'] ?? '',
    TrackDuration: result['TrackDuration'] ?? '',
    TrackMetaData: result['TrackMetaData'] ?? '',
    TrackURI: result['TrackURI'] ?? '',
    RelTime: result['RelTime'] ?? '',
    AbsTime: result['AbsTime'] ?? ''
  };
}

export function toMediaInfo(result: ActionResult): MediaInfo {
  return {
    NrTracks: result['NrTracks'] ?? '',
    MediaDuration: result['MediaDuration'] ?? '',
    CurrentURI: result['CurrentURI'] ?? '',
    CurrentURIMetaData: result['CurrentURIMetaData'] ?? '',
    NextURI: result['NextURI'] ?? '',
    NextURIMetaData: result['NextURIMetaData'] ?? ''
  };
}
