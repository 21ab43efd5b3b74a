export enum BodyFormat {
  Json = 'json',
  Xml = 'xml',
  FormUrlEncoded = 'form',
}
